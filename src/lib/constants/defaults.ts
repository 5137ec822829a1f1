/**
 * Default configuration constants for acme-wire
 *
 * Centralized wire constants and decoding policy. These values are used as
 * fallbacks when no explicit configuration is provided.
 */

import type { UnknownFieldPolicy } from '../json/types.js';

// Error documents
export const ERROR_TYPE_NAMESPACE = 'urn:acme:error:';

// Challenge dispatch
export const CHALLENGE_DISCRIMINANT = 'type';

// Revocation endpoint, resolved against the directory origin
export const REVOKE_CERT_PATH = '/acme/revoke-cert';

// Contact URI schemes used by Registration.fromData
export const PHONE_PREFIX = 'tel:';
export const EMAIL_PREFIX = 'mailto:';

// Decoding policy: unrecognized keys are ignored unless a caller opts into rejecting them
export const DEFAULT_UNKNOWN_FIELDS: UnknownFieldPolicy = 'ignore';
export const UNKNOWN_FIELDS_ENV = 'ACME_WIRE_UNKNOWN_FIELDS';
