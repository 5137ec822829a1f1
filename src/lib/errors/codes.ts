/**
 * ACME Error Codes
 *
 * Error documents returned by an ACME server carry a `type` made of the
 * namespace "urn:acme:error:" followed by one of the codes below. Codes
 * outside this table are rejected when an error document is decoded.
 */

import { ERROR_TYPE_NAMESPACE } from '../constants/defaults.js';

const prefix = ERROR_TYPE_NAMESPACE;

/**
 * ACME Error Type Constants
 *
 * Maps each recognized code to its fully namespaced type URN.
 */
export const ACME_ERROR = {
  /** The CSR is unacceptable (e.g., due to a short key) */
  badCSR: `${prefix}badCSR`,

  /**
   * The client sent an unacceptable anti-replay nonce
   *
   * Clients should retry with a fresh nonce from the Replay-Nonce header.
   */
  badNonce: `${prefix}badNonce`,

  /** The server could not connect to the client for domain validation */
  connection: `${prefix}connection`,

  /** The server could not validate a DNSSEC signed domain */
  dnssec: `${prefix}dnssec`,

  /** The request message was malformed */
  malformed: `${prefix}malformed`,

  /** The server experienced an internal error */
  serverInternal: `${prefix}serverInternal`,

  /** The server experienced a TLS error during domain validation */
  tls: `${prefix}tls`,

  /** The client lacks sufficient authorization */
  unauthorized: `${prefix}unauthorized`,

  /** The server could not resolve a domain name */
  unknownHost: `${prefix}unknownHost`,
} as const;

/** Bare error code, without namespace */
export type AcmeErrorCode = keyof typeof ACME_ERROR;

/** Union type of all ACME error type URNs */
export type AcmeErrorType = (typeof ACME_ERROR)[AcmeErrorCode];

/**
 * Human-readable description of each error code
 */
export const ERROR_DESCRIPTIONS: Readonly<Record<AcmeErrorCode, string>> = {
  badCSR: 'The CSR is unacceptable (e.g., due to a short key)',
  badNonce: 'The client sent an unacceptable anti-replay nonce',
  connection: 'The server could not connect to the client for DV',
  dnssec: 'The server could not validate a DNSSEC signed domain',
  malformed: 'The request message was malformed',
  serverInternal: 'The server experienced an internal error',
  tls: 'The server experienced a TLS error during DV',
  unauthorized: 'The client lacks sufficient authorization',
  unknownHost: 'The server could not resolve a domain name',
};

/** Token grammar of an error code */
export const ERROR_CODE_PATTERN = /^[A-Za-z][A-Za-z0-9]*$/;

export function isAcmeErrorCode(value: string): value is AcmeErrorCode {
  return Object.prototype.hasOwnProperty.call(ACME_ERROR, value);
}
