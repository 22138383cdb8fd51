import { SetMetadata } from '@nestjs/common';
import { TRANSITION_GUARD_METADATA } from '../workflow.constants';

export interface TransitionGuardMetadata {
  name: string;
}

/**
 * Registers the decorated provider as a named transition guard. The class
 * must implement ITransitionGuard and be listed as a provider somewhere in
 * the application so discovery can find it.
 */
export function TransitionGuard(name: string): ClassDecorator {
  const metadata: TransitionGuardMetadata = { name };
  return SetMetadata(TRANSITION_GUARD_METADATA, metadata);
}
