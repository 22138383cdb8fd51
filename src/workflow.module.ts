import { DynamicModule, Module, Provider } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { AuditLedger } from './services/audit-ledger.service';
import { TransitionEngine } from './services/transition-engine.service';
import { TransitionGuardRegistry } from './services/transition-guard-registry.service';
import { WorkflowDefinitionStore } from './services/workflow-definition-store.service';
import { WorkflowManager } from './services/workflow-manager.service';
import {
  WorkflowModuleOptions,
  WorkflowModuleAsyncOptions,
} from './interfaces/workflow-module-options.interface';
import {
  WORKFLOW_MODULE_OPTIONS,
  WORKFLOW_DB_ADAPTER,
  WORKFLOW_ENGINE,
  WORKFLOW_CLOCK,
  WORKFLOW_GRAPH_RULES,
} from './workflow.constants';
import { JavascriptStateMachineEngine } from './engines/javascript-state-machine.engine';
import { MonotonicClock } from './utils/clock';

const SERVICES = [
  TransitionGuardRegistry,
  WorkflowDefinitionStore,
  AuditLedger,
  TransitionEngine,
  WorkflowManager,
];

const EXPORTS = [
  ...SERVICES,
  WORKFLOW_DB_ADAPTER,
  WORKFLOW_ENGINE,
  WORKFLOW_CLOCK,
];

/** Providers derived from the resolved WORKFLOW_MODULE_OPTIONS value. */
const DERIVED_PROVIDERS: Provider[] = [
  {
    provide: WORKFLOW_DB_ADAPTER,
    useFactory: (opts: WorkflowModuleOptions) => opts.adapter,
    inject: [WORKFLOW_MODULE_OPTIONS],
  },
  {
    provide: WORKFLOW_ENGINE,
    useFactory: (opts: WorkflowModuleOptions) =>
      opts.engine ?? new JavascriptStateMachineEngine(),
    inject: [WORKFLOW_MODULE_OPTIONS],
  },
  {
    provide: WORKFLOW_CLOCK,
    useFactory: (opts: WorkflowModuleOptions) =>
      opts.clock ?? new MonotonicClock(),
    inject: [WORKFLOW_MODULE_OPTIONS],
  },
  {
    provide: WORKFLOW_GRAPH_RULES,
    useFactory: (opts: WorkflowModuleOptions) => opts.graphRules ?? [],
    inject: [WORKFLOW_MODULE_OPTIONS],
  },
];

@Module({})
export class WorkflowModule {
  static forRoot(options: WorkflowModuleOptions): DynamicModule {
    return {
      module: WorkflowModule,
      imports: [DiscoveryModule, EventEmitterModule.forRoot()],
      providers: [
        {
          provide: WORKFLOW_MODULE_OPTIONS,
          useValue: options,
        },
        ...DERIVED_PROVIDERS,
        ...SERVICES,
      ],
      exports: EXPORTS,
      global: true,
    };
  }

  static forRootAsync(options: WorkflowModuleAsyncOptions): DynamicModule {
    return {
      module: WorkflowModule,
      imports: [
        DiscoveryModule,
        EventEmitterModule.forRoot(),
        ...(options.imports ?? []),
      ],
      providers: [
        {
          provide: WORKFLOW_MODULE_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject ?? [],
        },
        ...DERIVED_PROVIDERS,
        ...SERVICES,
      ],
      exports: EXPORTS,
      global: true,
    };
  }
}
