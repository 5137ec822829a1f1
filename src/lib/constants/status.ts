/**
 * ACME Status and Identifier Type Constants
 *
 * Registries of the tokens a server may send for resource statuses and
 * identifier types. Using the exported canonical constants instead of string
 * literals keeps comparisons typo-free and lets decoding reject unknown values.
 */

import { ConstantRegistry, type Constant } from '../json/constant.js';

export const STATUS_NAMES = ['unknown', 'pending', 'processing', 'valid', 'invalid', 'revoked'] as const;

export type StatusName = (typeof STATUS_NAMES)[number];

/**
 * Resource status
 *
 * Challenge status transitions:
 * pending -> processing -> (valid|invalid)
 */
export const Status = new ConstantRegistry<StatusName>('Status', STATUS_NAMES);

export type StatusConstant = Constant<StatusName>;

export const STATUS_UNKNOWN = Status.get('unknown');
export const STATUS_PENDING = Status.get('pending');
export const STATUS_PROCESSING = Status.get('processing');
export const STATUS_VALID = Status.get('valid');
export const STATUS_INVALID = Status.get('invalid');
export const STATUS_REVOKED = Status.get('revoked');

export const IDENTIFIER_TYPE_NAMES = ['dns'] as const;

export type IdentifierTypeName = (typeof IDENTIFIER_TYPE_NAMES)[number];

/** Identifier types; `dns` names a fully qualified domain name */
export const IdentifierType = new ConstantRegistry<IdentifierTypeName>(
  'IdentifierType',
  IDENTIFIER_TYPE_NAMES,
);

export type IdentifierTypeConstant = Constant<IdentifierTypeName>;

export const IDENTIFIER_FQDN = IdentifierType.get('dns');

export function isStatusName(value: string): value is StatusName {
  return Status.has(value);
}
