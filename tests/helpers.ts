import { DiscoveryService, Reflector } from '@nestjs/core';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { InMemoryWorkflowAdapter } from '../src/adapters/in-memory-workflow.adapter';
import { IWorkflowDbAdapter } from '../src/interfaces/workflow-db-adapter.interface';
import type {
  GraphRule,
  WorkflowDefinitionInput,
} from '../src/interfaces/workflow-definition.interface';
import { AuditLedger } from '../src/services/audit-ledger.service';
import { TransitionEngine } from '../src/services/transition-engine.service';
import { TransitionGuardRegistry } from '../src/services/transition-guard-registry.service';
import { WorkflowDefinitionStore } from '../src/services/workflow-definition-store.service';
import { WorkflowManager } from '../src/services/workflow-manager.service';
import type { Clock } from '../src/utils/clock';

/** Clock the test moves by hand. */
export class FakeClock implements Clock {
  private current: number;

  constructor(start: string | Date = '2024-03-01T09:00:00.000Z') {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  set(at: string | Date): void {
    this.current = new Date(at).getTime();
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function createGuardRegistry(): TransitionGuardRegistry {
  const mockDiscovery = {
    getProviders: () => [],
  } as unknown as DiscoveryService;
  const mockReflector = { get: () => undefined } as unknown as Reflector;
  return new TransitionGuardRegistry(mockDiscovery, mockReflector);
}

export function createMockAdapter(): jest.Mocked<IWorkflowDbAdapter> {
  const mockAdapter: jest.Mocked<IWorkflowDbAdapter> = {
    insertDefinition: jest.fn(),
    findDefinitionById: jest.fn().mockResolvedValue(null),
    findDefinitionByKey: jest.fn().mockResolvedValue(null),
    listDefinitions: jest.fn().mockResolvedValue([]),
    updateDefinitionGraph: jest.fn().mockResolvedValue(undefined),
    setDefinitionActive: jest.fn().mockResolvedValue(undefined),
    countInstances: jest.fn().mockResolvedValue(0),
    insertInstance: jest.fn(),
    findInstance: jest.fn().mockResolvedValue(null),
    updateInstanceState: jest.fn().mockResolvedValue(true),
    findInstancesBySubject: jest.fn().mockResolvedValue([]),
    findInstancesByState: jest.fn().mockResolvedValue([]),
    insertTransition: jest.fn(),
    findTransitions: jest.fn().mockResolvedValue([]),
    findLastTransition: jest.fn().mockResolvedValue(null),
    transaction: jest.fn().mockImplementation(async (cb) => cb(mockAdapter)),
  };
  return mockAdapter;
}

export interface WorkflowStack {
  adapter: IWorkflowDbAdapter;
  clock: FakeClock;
  events: EventEmitter2;
  guards: TransitionGuardRegistry;
  definitions: WorkflowDefinitionStore;
  ledger: AuditLedger;
  engine: TransitionEngine;
  manager: WorkflowManager;
}

/** Wires the services by hand, without a Nest container. */
export function createWorkflowStack(
  options: {
    adapter?: IWorkflowDbAdapter;
    clock?: FakeClock;
    graphRules?: GraphRule[];
  } = {},
): WorkflowStack {
  const adapter = options.adapter ?? new InMemoryWorkflowAdapter();
  const clock = options.clock ?? new FakeClock();
  const events = new EventEmitter2();
  const guards = createGuardRegistry();
  const definitions = new WorkflowDefinitionStore(
    adapter,
    guards,
    events,
    options.graphRules,
  );
  const ledger = new AuditLedger(adapter, clock);
  const engine = new TransitionEngine(adapter, ledger, guards, events, clock);
  const manager = new WorkflowManager(definitions, adapter, events, clock);

  return {
    adapter,
    clock,
    events,
    guards,
    definitions,
    ledger,
    engine,
    manager,
  };
}

/** draft -> review -> (approved | rejected), review can send back to draft. */
export const reviewWorkflow: WorkflowDefinitionInput = {
  key: 'document_review',
  name: 'Document review',
  states: ['draft', 'review', 'approved', 'rejected'],
  transitions: {
    draft: ['review'],
    review: ['draft', 'approved', 'rejected'],
  },
  initialState: 'draft',
  terminalStates: ['approved', 'rejected'],
};

/** A -> B -> C with C terminal. */
export const abcWorkflow: WorkflowDefinitionInput = {
  key: 'abc',
  states: ['A', 'B', 'C'],
  transitions: { A: ['B'], B: ['C'] },
  initialState: 'A',
  terminalStates: ['C'],
};

/** Single state with a self-loop; never ends. */
export const counterWorkflow: WorkflowDefinitionInput = {
  key: 'counter',
  states: ['open', 'closed'],
  transitions: { open: ['open', 'closed'] },
  initialState: 'open',
  terminalStates: ['closed'],
};
