import type { RemovalMode } from '@domain/entities/types.js';
import type { StepCode } from '@domain/entities/step-code.js';
import type { IBucket } from './bucket.js';
import type { JobCounterSource } from './job-counters.js';
import type { Logger } from '@logging/logger.js';

/**
 * 调度器句柄
 */
export interface SchedulerHandle {
  readonly id: string;
  isAlive(): boolean;
}

/**
 * 任务管理器句柄
 */
export interface ManagerHandle {
  readonly id: string;
  readonly status: string;
}

/**
 * 正在运行的步骤
 */
export interface RunningStep {
  readonly schedulers: readonly SchedulerHandle[];
  readonly managers: readonly ManagerHandle[];
}

/**
 * 处理接口（存储/接口协作方）
 * 每次选择包时针对数据集和包标题创建，维护步骤命名空间和任务计数器
 */
export interface IProcessingInterface {
  /** 包标签，用作数据查询的 pipelines 过滤键 */
  readonly label: string;

  /** 已处理步骤：步骤代码 → 存储路径/名称 */
  readonly executed: ReadonlyMap<string, string>;

  /** 报告：步骤代码 → 存储路径/名称 */
  readonly reported: ReadonlyMap<string, string>;

  /** 掩膜：步骤代码 → 存储路径/名称 */
  readonly masked: ReadonlyMap<string, string>;

  /** 排队中的步骤代码 */
  readonly waitingList: readonly string[];

  /** 排队/完成的任务计数 */
  readonly jobCounters: JobCounterSource;

  /** 正在运行的步骤：步骤名 → 运行句柄 */
  readonly runningSteps: ReadonlyMap<string, RunningStep>;

  /**
   * 从存储重新读取命名空间
   */
  update(): void;

  /**
   * 删除某个步骤代码下已产生的数据
   * @param stepCode 步骤代码
   * @param mode 删除模式
   */
  destroyStep(stepCode: StepCode, mode: RemovalMode): void;
}

/**
 * 创建处理接口时的选项
 */
export interface ProcessingInterfaceOptions {
  logging: boolean;
  nThreads: number;
  logger: Logger;
}

/**
 * 处理接口工厂
 */
export type ProcessingInterfaceFactory = (
  bucket: IBucket,
  title: string,
  options: ProcessingInterfaceOptions,
) => IProcessingInterface;
