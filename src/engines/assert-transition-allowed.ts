import { IllegalTransitionError } from '../errors/illegal-transition.error';
import { InstanceTerminatedError } from '../errors/instance-terminated.error';
import type { TransitionDecision } from '../interfaces/workflow-engine.interface';

/** Throws the error matching a refused decision. */
export function assertTransitionAllowed(
  instanceId: string,
  decision: TransitionDecision,
): void {
  switch (decision.kind) {
    case 'allowed':
      return;
    case 'terminal':
      throw new InstanceTerminatedError(
        instanceId,
        decision.fromState,
        decision.toState,
      );
    case 'illegal':
      throw new IllegalTransitionError(
        instanceId,
        decision.fromState,
        decision.toState,
        decision.allowedTargets,
      );
  }
}
