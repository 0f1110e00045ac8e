/**
 * Principal Types
 *
 * A principal is the opaque identity of a caller, beneficiary or
 * depositor. The engine never interprets it beyond equality and the
 * null check below.
 */

/** Opaque principal identifier (account address, user id, ...). */
export type Principal = string;

/**
 * The null principal. Ownership and beneficiary slots may never be
 * assigned to it.
 */
export const NULL_PRINCIPAL: Principal = "";

/**
 * True when the principal is empty or whitespace only.
 */
export function isNullPrincipal(principal: Principal): boolean {
  return principal.trim() === NULL_PRINCIPAL;
}
