import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import type { IWorkflowDbAdapter } from './workflow-db-adapter.interface';
import type { IWorkflowEngine } from './workflow-engine.interface';
import type { GraphRule } from './workflow-definition.interface';
import type { Clock } from '../utils/clock';

export interface WorkflowModuleOptions {
  /** Database adapter instance implementing IWorkflowDbAdapter */
  adapter: IWorkflowDbAdapter;
  /** Optional edge evaluator override */
  engine?: IWorkflowEngine;
  /** Source of recorded time. Default: MonotonicClock */
  clock?: Clock;
  /** Extra graph checks run after the structural validation passes */
  graphRules?: GraphRule[];
}

export interface WorkflowModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  useFactory: (
    ...args: any[]
  ) => Promise<WorkflowModuleOptions> | WorkflowModuleOptions;
  inject?: FactoryProvider['inject'];
}
