/**
 * Errors raised by the member checks and the section catalogue.
 */

export type DesignCheckErrorCode = 'SECTION_NOT_FOUND' | 'DEGENERATE_GEOMETRY' | 'ZERO_CAPACITY';

export class DesignCheckError extends Error {
  readonly code: DesignCheckErrorCode;

  constructor(code: DesignCheckErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class SectionNotFoundError extends DesignCheckError {
  readonly designation: string;

  constructor(designation: string) {
    super('SECTION_NOT_FOUND', `Section '${designation}' not found. Use listSections() to see available designations.`);
    this.designation = designation;
  }
}

export class DegenerateGeometryError extends DesignCheckError {
  readonly property: string;
  readonly value: number;

  constructor(property: string, value: number) {
    super('DEGENERATE_GEOMETRY', `Degenerate geometry: ${property} must be a positive finite number (got ${value})`);
    this.property = property;
    this.value = value;
  }
}

export class ZeroCapacityError extends DesignCheckError {
  readonly check: string;

  constructor(check: string, capacity: number) {
    super('ZERO_CAPACITY', `Zero capacity: ${check} design capacity is ${capacity}, demand/capacity ratio is undefined`);
    this.check = check;
  }
}

/** Throw DegenerateGeometryError unless value is finite and > 0 */
export function requirePositive(property: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new DegenerateGeometryError(property, value);
  }
  return value;
}

/** Throw ZeroCapacityError unless a design capacity can be divided by */
export function requireCapacity(check: string, capacity: number): number {
  if (!Number.isFinite(capacity) || capacity <= 0) {
    throw new ZeroCapacityError(check, capacity);
  }
  return capacity;
}

export function isDesignCheckError(err: unknown): err is DesignCheckError {
  return err instanceof DesignCheckError;
}
