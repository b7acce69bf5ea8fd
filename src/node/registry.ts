/**
 * Kind Registry
 * Records node kinds and rejects classes missing a kernel primitive.
 */

import { createError } from '../error-classes.js';

/** Methods every node class must define; there is no default for these */
export const KERNEL_METHODS = [
  'children',
  'accept',
  'clone',
  'equals',
] as const;

/** Anything with a prototype: a class, or a constructor function from JS */
export interface NodeClass {
  readonly name: string;
  readonly prototype: object;
}

export interface KindRegistration {
  readonly kind: string;
  readonly nodeClass: NodeClass;
}

// ============================================================
// REGISTRY
// ============================================================

export class KindRegistry {
  private readonly byKind = new Map<string, KindRegistration>();

  /**
   * Register a kind.
   *
   * @throws NodeContractError ARBOR-K001 if a kernel method is missing
   * @throws NodeContractError ARBOR-K002 if the kind name is taken
   */
  register(kind: string, nodeClass: NodeClass): KindRegistration {
    for (const method of KERNEL_METHODS) {
      if (typeof Reflect.get(nodeClass.prototype, method) !== 'function') {
        throw createError('ARBOR-K001', { kind, method });
      }
    }

    if (this.byKind.has(kind)) {
      throw createError('ARBOR-K002', { kind });
    }

    const registration: KindRegistration = { kind, nodeClass };
    this.byKind.set(kind, registration);
    return registration;
  }

  has(kind: string): boolean {
    return this.byKind.has(kind);
  }

  get(kind: string): KindRegistration | undefined {
    return this.byKind.get(kind);
  }

  /** Registered kind names in registration order */
  kinds(): string[] {
    return [...this.byKind.keys()];
  }

  get size(): number {
    return this.byKind.size;
  }
}

/** Registry used by define* functions when no registry is passed */
export const defaultKindRegistry = new KindRegistry();
