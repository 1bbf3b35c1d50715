import { z } from 'zod';
import { Logger, logger as defaultLogger } from '@logging/logger.js';
import { AppConfig, validateConfig } from '@config/config.js';
import type {
  BindingState,
  DatasetView,
  PackageIndex,
  RemovalMode,
  SelectionState,
} from '@domain/entities/types.js';
import { StepCodeListSchema } from '@domain/entities/step-code.js';
import type { IBucket, BucketFactory } from '@domain/interfaces/bucket.js';
import type { IPluginLoader } from '@domain/interfaces/plugins.js';
import type {
  IProcessingInterface,
  ManagerHandle,
  RunningStep,
  SchedulerHandle,
} from '@domain/interfaces/processing.js';
import type { ProgressSink } from '@domain/interfaces/progress.js';
import {
  createEmptyPackage,
  PipelinePackage,
} from '@domain/pipeline/PipelinePackage.js';
import { PipelineDefinition } from '@domain/pipeline/PipelineDefinition.js';
import { CoreErrorFactory } from '@domain/errors/CoreErrorFactory.js';
import { LoggerProgressSink } from '@infrastructure/progress/LoggerProgressSink.js';
import { StepRegistry } from './core/StepRegistry.js';
import { ParameterBinder, resolveParameters } from './core/ParameterBinder.js';
import { DatasetQueryOptions, DatasetResolver } from './core/DatasetResolver.js';
import { ProgressTracker } from './core/ProgressTracker.js';

const RemovalModeSchema = z.enum(['processing', 'reporting', 'masking']);

/**
 * 编排器依赖的协作方
 */
export interface OrchestratorCollaborators {
  /** 插件加载 */
  plugins: IPluginLoader;
  /** 按数据集路径创建存储 */
  createBucket: BucketFactory;
}

/**
 * 编排器选项，未设置的 logging / nThreads / verbose 使用全局配置
 */
export interface OrchestratorOptions {
  logging?: boolean;
  nThreads?: number;
  verbose?: boolean;
  logger?: Logger;
  /** 每次跟踪进度时创建新的进度显示 */
  progressSink?: () => ProgressSink;
  progressIntervalMs?: number;
  config?: AppConfig;
}

/**
 * 当前包的绑定：包实例、步骤注册表和参数绑定器总是一起重建
 */
interface Binding {
  pkg: PipelinePackage;
  /** 通过序号选中时的包序号，临时包为 null */
  packageId: PackageIndex | null;
  definition: PipelineDefinition;
  registry: StepRegistry;
  binder: ParameterBinder;
}

/**
 * 处理管线编排器
 *
 * 选择插件包、绑定步骤与参数、执行步骤，并汇报进度和数据查询结果。
 * 选择状态：unselected → selected（detachPackage 可回退）；
 * 绑定状态：reset 后为 fresh，选择或参数变化后为 stale。
 */
export class PipelineOrchestrator {
  private readonly _bucket: IBucket;
  private readonly plugins: IPluginLoader;
  private readonly logger: Logger;
  private readonly logging: boolean;
  private readonly nThreads: number;
  private readonly verbose: boolean;
  private readonly progressIntervalMs: number;
  private readonly createProgressSink: () => ProgressSink;

  private binding: Binding | null = null;
  private processingInterface: IProcessingInterface | null = null;
  private appliedParams: Record<string, unknown> = {};
  private freshness: BindingState = 'stale';

  /**
   * 创建编排器
   * @param datasetPath 数据集路径
   * @param collaborators 插件加载与存储协作方
   * @param options 编排器选项
   */
  constructor(
    datasetPath: string,
    collaborators: OrchestratorCollaborators,
    options: OrchestratorOptions = {},
  ) {
    const config = options.config ?? validateConfig();
    const logger = options.logger ?? defaultLogger;

    this.logger = logger;
    this.plugins = collaborators.plugins;
    this._bucket = collaborators.createBucket(datasetPath);
    this.logging = options.logging ?? config.preferences.logging;
    this.nThreads = options.nThreads ?? config.preferences.nThreads;
    this.verbose = options.verbose ?? config.preferences.verbose;
    this.progressIntervalMs =
      options.progressIntervalMs ?? config.progress.intervalMs;
    this.createProgressSink =
      options.progressSink ?? (() => new LoggerProgressSink(logger));

    if (this.verbose) {
      this.logger.info(this._bucket.summary);
      this.logger.info(
        ['List of installed pipeline packages:', ...this.listInstalled()].join(
          '\n',
        ),
      );
    }
  }

  // ============ 包选择 ============

  /**
   * 已安装的包：序号 → 标题
   */
  get installedPackages(): ReadonlyMap<PackageIndex, string> {
    return this.plugins.availablePackages;
  }

  /** 选择状态 */
  get selectionState(): SelectionState {
    return this.binding ? 'selected' : 'unselected';
  }

  /** 绑定状态 */
  get bindingState(): BindingState {
    return this.freshness;
  }

  /** 当前包实例，未选择时为 null */
  get selected(): PipelineDefinition | null {
    return this.binding?.definition ?? null;
  }

  /** 当前包的步骤：序号 → 步骤名，未选择时为 null */
  get installedPipelines(): ReadonlyMap<number, string> | null {
    return this.binding?.registry.names() ?? null;
  }

  /**
   * 按序号选择包
   * @param packageId 包序号
   * @param params 初始参数
   * @throws INVALID_PACKAGE_IDENTIFIER 序号不是已安装包的整数序号
   */
  setPackage(packageId: PackageIndex, params: Record<string, unknown> = {}): void {
    const title =
      typeof packageId === 'number' && Number.isInteger(packageId)
        ? this.installedPackages.get(packageId)
        : undefined;
    const pkg =
      title === undefined ? undefined : this.plugins.getPackage(packageId);
    if (title === undefined || !pkg) {
      throw CoreErrorFactory.invalidPackageIdentifier(packageId, [
        ...this.installedPackages.keys(),
      ]);
    }

    this._bucket.update();
    this.commit(this.bind(pkg, packageId, params), params);

    if (this.verbose) {
      this.logger.info(`Description about this package:\n${pkg.description ?? ''}`);
      this.logger.info(
        `The pipeline package '${title}' is selected.\n` +
          'Please double check if all parameters are correctly provided before run this pipeline',
      );
      this.logger.info(
        [
          'List of available pipelines in selected package:',
          ...this.listSteps(),
        ].join('\n'),
      );
    }
  }

  /**
   * 以给定标题创建没有步骤和参数的临时包，不查询已安装的包
   * @param title 包标题
   * @throws CONFIGURATION_ERROR 标题为空，此时原来的选择保持不变
   */
  setEmptyPackage(title: string): void {
    const pkg = createEmptyPackage(title);
    this._bucket.update();
    const next = this.bind(pkg, null, {});
    this.detachPackage();
    this.commit(next, {});
    if (this.verbose) {
      this.logger.info(`temporary pipeline package [${title}] is initiated.`);
    }
  }

  /**
   * 取消当前选择；处理接口保留，仍可查询数据
   */
  detachPackage(): void {
    this.binding = null;
    this.appliedParams = {};
    this.freshness = 'stale';
  }

  /**
   * 按当前选择重建处理接口、包实例、步骤注册表和参数绑定器；未选择时不做任何事
   * @param params 追加的参数，与之前应用过的参数合并
   */
  reset(params: Record<string, unknown> = {}): void {
    if (!this.binding) {
      this.logger.debug('未选择包，忽略 reset');
      return;
    }
    const merged = { ...this.appliedParams, ...params };
    const { pkg, packageId } = this.binding;
    this.commit(this.bind(pkg, packageId, merged), merged);
  }

  // ============ 参数 ============

  /**
   * 设置参数
   * @param params 参数名 → 参数值
   * @throws NO_PACKAGE_SELECTED 未选择包
   * @throws UNKNOWN_PARAMETER_NAME 参数未声明
   */
  setParam(params: Record<string, unknown>): void {
    const binding = this.requireBinding('setParam');
    if (Object.keys(params).length === 0) {
      return;
    }
    binding.binder.apply(params);
    this.appliedParams = { ...this.appliedParams, ...params };
    this.freshness = 'stale';
  }

  /**
   * 获取当前参数
   * @returns 参数名 → 参数值，未选择时为 null
   */
  getParam(): Record<string, unknown> | null {
    return this.binding ? this.binding.binder.getAll() : null;
  }

  // ============ 执行 ============

  /**
   * 执行当前包中的步骤
   * @param stepIndex 步骤序号
   * @param params 本次执行前应用的参数
   * @throws NO_PACKAGE_SELECTED 未选择包
   * @throws UNKNOWN_STEP_INDEX 序号超出范围
   */
  async run(stepIndex: number, params: Record<string, unknown> = {}): Promise<void> {
    this.requireBinding('run');
    this.reset();
    this.setParam(params);

    const { registry } = this.requireBinding('run');
    const step = registry.get(stepIndex);
    if (this.verbose && step.description) {
      this.logger.info(step.description);
    }
    await registry.invoke(stepIndex);
  }

  /**
   * 获取包的说明
   * @param key 包序号或标题
   * @returns 说明文本，包未安装时为 undefined
   */
  howto(key: PackageIndex | string): string | undefined {
    const pkg = this.plugins.getPackage(key);
    if (!pkg) {
      return undefined;
    }
    const text = pkg.description ?? '';
    if (this.verbose) {
      this.logger.info(text);
    }
    return text;
  }

  /**
   * 删除步骤代码下已产生的数据
   * @param stepCode 步骤代码或步骤代码列表
   * @param mode 删除模式
   * @throws MALFORMED_STEP_CODE 代码不是 3 个字符的字符串（或其列表）
   * @throws NO_PACKAGE_SELECTED 还没有处理接口
   */
  remove(
    stepCode: string | readonly string[],
    mode: RemovalMode = 'processing',
  ): void {
    const codes = StepCodeListSchema.safeParse(stepCode);
    if (!codes.success) {
      throw CoreErrorFactory.malformedStepCode(stepCode);
    }
    const removalMode = RemovalModeSchema.safeParse(mode);
    if (!removalMode.success) {
      throw CoreErrorFactory.validation(`Unknown removal mode '${String(mode)}'`, {
        mode: String(mode),
      });
    }
    const processing = this.requireProcessing('remove');
    for (const code of codes.data) {
      processing.destroyStep(code, removalMode.data);
      this.logger.info(`已删除步骤数据: ${code} (${removalMode.data})`);
    }
  }

  /**
   * 查询步骤代码对应的数据
   * @param stepCode 步骤代码
   * @param options 查询选项（扩展名默认 nii.gz）
   * @returns 数据集视图；没有数据或还没有处理接口时为 null
   */
  getDset(stepCode: string, options: DatasetQueryOptions = {}): DatasetView | null {
    if (!this.processingInterface) {
      return null;
    }
    const resolver = new DatasetResolver(
      this.processingInterface,
      this._bucket,
      this.logger,
    );
    return resolver.query(stepCode, options);
  }

  /**
   * 开始跟踪当前处理接口的任务进度
   * @returns 已启动的跟踪器；还没有处理接口时为 undefined
   */
  checkProgression(): ProgressTracker | undefined {
    const processing = this.processingInterface;
    if (!processing) {
      return undefined;
    }
    const tracker = new ProgressTracker(processing.jobCounters, {
      description: this.binding?.pkg.title ?? processing.label,
      sink: this.createProgressSink(),
      intervalMs: this.progressIntervalMs,
      logger: this.logger,
    });
    tracker.start();
    return tracker;
  }

  // ============ 只读属性 ============

  get bucket(): IBucket {
    return this._bucket;
  }

  /** 处理接口 */
  get processing(): IProcessingInterface | null {
    return this.processingInterface;
  }

  /** 正在运行的步骤的调度器：步骤名 → 调度器句柄 */
  get schedulers(): ReadonlyMap<string, readonly SchedulerHandle[]> {
    const running = this.runningSteps();
    return new Map(
      Array.from(running, ([name, step]): [string, readonly SchedulerHandle[]] => [
        name,
        step.schedulers,
      ]),
    );
  }

  /** 正在运行的步骤的任务管理器：步骤名 → 管理器句柄 */
  get managers(): ReadonlyMap<string, readonly ManagerHandle[]> {
    const running = this.runningSteps();
    return new Map(
      Array.from(running, ([name, step]): [string, readonly ManagerHandle[]] => [
        name,
        step.managers,
      ]),
    );
  }

  /**
   * 当前包已有数据的摘要，未选择时为 null
   */
  get summary(): string | null {
    const binding = this.binding;
    const processing = this.processingInterface;
    if (!binding || !processing) {
      return null;
    }
    processing.update();

    const lines = [
      `** List of existing steps in selected package [${binding.pkg.title}]:\n`,
    ];
    const sections: Array<[string, ReadonlyMap<string, string>]> = [
      ['- Processed steps:', processing.executed],
      ['- Reported steps:', processing.reported],
      ['- Mask data:', processing.masked],
    ];
    for (const [heading, namespace] of sections) {
      if (namespace.size === 0) {
        continue;
      }
      lines.push(heading);
      const entries = Array.from(namespace).sort(([a], [b]) =>
        a < b ? -1 : a > b ? 1 : 0,
      );
      for (const [code, name] of entries) {
        lines.push(`\t${code}: ${name}`);
      }
    }
    if (processing.waitingList.length > 0) {
      lines.push('- Queue:');
      lines.push(`\t${processing.waitingList.join(', ')}`);
    }
    return lines.join('\n');
  }

  toString(): string {
    return this.summary ?? 'No pipeline package selected';
  }

  // ============ 内部 ============

  /**
   * 构建新的绑定；任何一步失败都不会影响当前绑定
   */
  private bind(
    pkg: PipelinePackage,
    packageId: PackageIndex | null,
    params: Record<string, unknown>,
  ): Binding & { processing: IProcessingInterface } {
    const values = resolveParameters(pkg.parameters, {}, params, pkg.title);
    const processing = this.plugins.createInterface(this._bucket, pkg.title, {
      logging: this.logging,
      nThreads: this.nThreads,
      logger: this.logger,
    });
    const definition = new PipelineDefinition(
      pkg,
      processing,
      values,
      this.logger,
    );
    return {
      pkg,
      packageId,
      processing,
      definition,
      registry: new StepRegistry(definition, this.logger),
      binder: new ParameterBinder(definition, params, this.logger),
    };
  }

  private commit(
    next: Binding & { processing: IProcessingInterface },
    params: Record<string, unknown>,
  ): void {
    const { processing, ...binding } = next;
    this.binding = binding;
    this.processingInterface = processing;
    this.appliedParams = { ...params };
    this.freshness = 'fresh';
    this.logger.debug(`[${binding.pkg.title}] 绑定已重建`, {
      steps: binding.registry.count,
    });
  }

  private requireBinding(operation: string): Binding {
    if (!this.binding) {
      throw CoreErrorFactory.noPackageSelected(operation);
    }
    return this.binding;
  }

  private requireProcessing(operation: string): IProcessingInterface {
    if (!this.processingInterface) {
      throw CoreErrorFactory.noPackageSelected(operation);
    }
    return this.processingInterface;
  }

  private runningSteps(): ReadonlyMap<string, RunningStep> {
    return this.processingInterface?.runningSteps ?? new Map<string, RunningStep>();
  }

  private listInstalled(): string[] {
    return Array.from(
      this.installedPackages,
      ([index, title]) => `\t${index} : ${title}`,
    );
  }

  private listSteps(): string[] {
    return Array.from(
      this.installedPipelines ?? new Map<number, string>(),
      ([index, name]) => `\t${index} : ${name}`,
    );
  }
}
