/**
 * Core domain types for hostforge.
 * These types are shared across the runner, resources, reporters and playbooks.
 */

import type { IHost } from '../host/index.js';
import type { RESOURCE_KINDS, TASK_STATUS } from '../constants/index.js';

export type ResourceKind = (typeof RESOURCE_KINDS)[keyof typeof RESOURCE_KINDS];

export type TaskStatus = (typeof TASK_STATUS)[keyof typeof TASK_STATUS];

export type TaskKind = 'action' | 'handler';

export interface ICheckResult {
  satisfied: boolean;
  reason?: string; // Why the resource is (not) in the declared state
}

export interface IApplyResult {
  changed: boolean;
  detail?: string;
}

/**
 * A declared piece of host state. `check` must not mutate the host.
 */
export interface IResource {
  readonly kind: ResourceKind;
  describe(): string;
  check(host: IHost): Promise<ICheckResult>;
  apply(host: IHost): Promise<IApplyResult>;
}

export interface ITask {
  name: string;
  resource: IResource;
  notify?: string[]; // Handler names queued when this task changes the host
}

export interface IAction extends ITask {}

/**
 * Reachable only through notification; never part of the main sequence.
 */
export interface IHandler extends ITask {}

export interface IPlaybook {
  name: string;
  actions: IAction[];
  handlers: IHandler[];
}

export interface ITaskResult {
  name: string;
  kind: TaskKind;
  status: TaskStatus;
  resource: string;
  durationMs: number;
  detail?: string;
  error?: string;
  checkMode?: boolean; // Reported as changed without applying
  notified?: string[];
}

export interface IRunSummary {
  startTime: number;
  endTime: number;
  success: boolean;
  fatal: boolean; // Main sequence aborted by a check/apply failure
  unchanged: number;
  changed: number;
  failed: number;
  reason?: string;
}

export interface IRunResult {
  host: string;
  playbook?: string;
  results: ITaskResult[];
  summary: IRunSummary;
}
