/**
 * ClientRef - A client profile, with the identities needed for ownership checks
 */
export interface ClientRef {
  readonly kind: 'client';
  /** Client profile id */
  readonly id: number;
  /** User account that owns the client profile */
  readonly owningUserId: number;
  /** Employee profile the client is currently assigned to (null when unassigned) */
  readonly assignedEmployeeId: number | null;
}

/**
 * EmployeeRef - An employee profile
 */
export interface EmployeeRef {
  readonly kind: 'employee';
  /** Employee profile id */
  readonly id: number;
  /** User account that owns the employee profile */
  readonly owningUserId: number;
}

/**
 * InvestmentRef - An investment held by a client
 */
export interface InvestmentRef {
  readonly kind: 'investment';
  /** Investment id */
  readonly id: number;
  /** User account of the client that owns the investment */
  readonly owningClientUserId: number;
  /** Employee profile assigned to the owning client, when known */
  readonly assignedEmployeeId?: number | null;
}

/**
 * UserAccountRef - A user account (self-service edits, password changes)
 */
export interface UserAccountRef {
  readonly kind: 'userAccount';
  /** User account id */
  readonly id: number;
}

/**
 * ResourceRef - Closed tagged union over every entity shape the evaluator understands
 * Each variant is flat and fully resolved: evaluation needs no further lookups
 */
export type ResourceRef = ClientRef | EmployeeRef | InvestmentRef | UserAccountRef;

// Discriminator values of ResourceRef
export type ResourceKind = ResourceRef['kind'];

// All discriminator values, used to validate route params
export const RESOURCE_KINDS: readonly ResourceKind[] = ['client', 'employee', 'investment', 'userAccount'] as const;

/**
 * Type guard for untrusted resource kind names
 * @param value - Value to check
 */
export function isResourceKind(value: unknown): value is ResourceKind {
  return typeof value === 'string' && (RESOURCE_KINDS as readonly string[]).includes(value);
}

export function clientRef(id: number, owningUserId: number, assignedEmployeeId: number | null): ClientRef {
  return { kind: 'client', id, owningUserId, assignedEmployeeId };
}

export function employeeRef(id: number, owningUserId: number): EmployeeRef {
  return { kind: 'employee', id, owningUserId };
}

export function investmentRef(
  id: number,
  owningClientUserId: number,
  assignedEmployeeId: number | null = null
): InvestmentRef {
  return { kind: 'investment', id, owningClientUserId, assignedEmployeeId };
}

export function userAccountRef(id: number): UserAccountRef {
  return { kind: 'userAccount', id };
}
