import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import type { TransitionGuardMetadata } from '../decorators/transition-guard.decorator';
import { DuplicateGuardError } from '../errors/duplicate-guard.error';
import { GuardNotRegisteredError } from '../errors/guard-not-registered.error';
import type { ITransitionGuard } from '../interfaces/transition-guard.interface';
import { TRANSITION_GUARD_METADATA } from '../workflow.constants';

export interface RegisteredGuard {
  name: string;
  guard: ITransitionGuard;
  source: string;
}

function isTransitionGuard(value: unknown): value is ITransitionGuard {
  return (
    typeof value === 'object' &&
    value !== null &&
    'validate' in value &&
    typeof value.validate === 'function'
  );
}

@Injectable()
export class TransitionGuardRegistry implements OnModuleInit {
  private readonly logger = new Logger(TransitionGuardRegistry.name);
  private readonly registrations = new Map<string, RegisteredGuard>();

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly reflector: Reflector,
  ) {}

  onModuleInit(): void {
    const providers = this.discoveryService.getProviders();
    for (const wrapper of providers) {
      if (!wrapper.metatype) continue;

      const metadata = this.reflector.get<TransitionGuardMetadata | undefined>(
        TRANSITION_GUARD_METADATA,
        wrapper.metatype,
      );
      if (!metadata) continue;

      const instance: unknown = wrapper.instance;
      if (!isTransitionGuard(instance)) {
        throw new TypeError(
          `${wrapper.metatype.name} is decorated with @TransitionGuard('${metadata.name}') but has no validate() method`,
        );
      }

      this.register(metadata.name, instance);
      this.logger.log(
        `Registered transition guard: ${metadata.name} -> ${wrapper.metatype.name}`,
      );
    }
  }

  register(name: string, guard: ITransitionGuard): void {
    const source = guard.constructor.name;
    const existing = this.registrations.get(name);
    if (existing) {
      throw new DuplicateGuardError(name, existing.source, source);
    }
    this.registrations.set(name, { name, guard, source });
  }

  has(name: string): boolean {
    return this.registrations.has(name);
  }

  get(name: string): ITransitionGuard | undefined {
    return this.registrations.get(name)?.guard;
  }

  getAll(): RegisteredGuard[] {
    return Array.from(this.registrations.values());
  }

  getOrThrow(name: string): ITransitionGuard {
    const registration = this.registrations.get(name);
    if (!registration) {
      throw new GuardNotRegisteredError(name);
    }
    return registration.guard;
  }
}
