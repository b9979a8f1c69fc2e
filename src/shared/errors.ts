// shared/errors.ts — Fatal contract violations

/**
 * Raised when the simulation is asked to do something the dispatch policy
 * must never produce: an oversized sale, a purchase without the exact foo
 * cost, or a payment the treasury cannot cover. Not meant to be caught.
 */
export class ContractViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolation';
  }
}
