import type { Property } from '../property/property.js';
import type { Fuzzer } from './fuzzer.js';

/**
 * View of the property currently being fuzzed, handed to every rule.
 *
 * One context is created per `fuzz()` call and rebound to each property in
 * turn, so rules must not keep it beyond their own invocation.
 */
export interface FuzzContext {
  readonly property: Property;
  readonly fuzzer: Fuzzer;
  /** Object whose properties are being assigned */
  readonly target: object;
  /** Whether the running pass includes inherited properties */
  readonly includeInherited: boolean;
  /** Reads the property's current value from the target */
  currentValue(): unknown;
}

export class PassContext implements FuzzContext {
  private current: Property | undefined;

  constructor(
    readonly fuzzer: Fuzzer,
    readonly target: object,
    readonly includeInherited: boolean
  ) {}

  get property(): Property {
    if (!this.current) {
      throw new Error('Context is not bound to a property yet');
    }
    return this.current;
  }

  bind(property: Property): this {
    this.current = property;
    return this;
  }

  currentValue(): unknown {
    return this.property.getValue(this.target);
  }
}
