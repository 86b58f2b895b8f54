/**
 * Branded Types for Domain IDs
 *
 * Nominal string types so a claim number can't be passed where an employee
 * id is expected. Still plain strings at runtime.
 */

// =============================================================================
// § Brand Symbols
// =============================================================================

declare const ClaimIdBrand: unique symbol;
declare const EmployeeIdBrand: unique symbol;
declare const NotificationIdBrand: unique symbol;
declare const AuditEntryIdBrand: unique symbol;
declare const EventIdBrand: unique symbol;

// =============================================================================
// § Branded Types
// =============================================================================

export type ClaimId = string & { readonly __brand: typeof ClaimIdBrand };
export type EmployeeId = string & { readonly __brand: typeof EmployeeIdBrand };
export type NotificationId = string & { readonly __brand: typeof NotificationIdBrand };
export type AuditEntryId = string & { readonly __brand: typeof AuditEntryIdBrand };
export type EventId = string & { readonly __brand: typeof EventIdBrand };

// =============================================================================
// § Constructor Functions
// =============================================================================

export function ClaimId(value: string): ClaimId {
  return value as ClaimId;
}

export function EmployeeId(value: string): EmployeeId {
  return value as EmployeeId;
}

export function NotificationId(value: string): NotificationId {
  return value as NotificationId;
}

export function AuditEntryId(value: string): AuditEntryId {
  return value as AuditEntryId;
}

export function EventId(value: string): EventId {
  return value as EventId;
}
