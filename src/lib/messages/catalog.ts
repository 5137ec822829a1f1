/**
 * Decoders by message kind, for callers that pick the message type at run
 * time (the CLI, transports dispatching on the endpoint).
 */

import { decodeChallenge } from '../challenges/challenges.js';
import { Jwk } from '../crypto/jwk.js';
import type { DecodeOptions, JsonSerializable } from '../json/types.js';
import { Authorization, Identifier, NewAuthorization } from './authorization.js';
import { CertificateRequest } from './certificate-request.js';
import { ChallengeBody } from './challenge-body.js';
import { ErrorMessage } from './error.js';
import { Registration } from './registration.js';
import {
  AuthorizationResource,
  ChallengeResource,
  RegistrationResource,
} from './resources.js';
import { Revocation } from './revocation.js';

export interface DecodedMessage extends JsonSerializable {
  hash(): string;
}

export interface MessageKind {
  readonly description: string;
  decode(json: unknown, options?: DecodeOptions): DecodedMessage;
}

export const MESSAGE_KINDS = {
  error: { description: 'Error document', decode: ErrorMessage.fromJSON },
  challenge: { description: 'Challenge variant', decode: decodeChallenge },
  'challenge-body': { description: 'Challenge with URI and status', decode: ChallengeBody.fromJSON },
  identifier: { description: 'Identifier', decode: Identifier.fromJSON },
  authorization: { description: 'Authorization', decode: Authorization.fromJSON },
  'new-authz': { description: 'New authorization request', decode: NewAuthorization.fromJSON },
  registration: { description: 'Account registration', decode: Registration.fromJSON },
  revocation: { description: 'Certificate revocation request', decode: Revocation.fromJSON },
  'certificate-request': {
    description: 'Certificate issuance request',
    decode: CertificateRequest.fromJSON,
  },
  'challenge-resource': { description: 'Challenge resource', decode: ChallengeResource.fromJSON },
  'registration-resource': {
    description: 'Registration resource',
    decode: RegistrationResource.fromJSON,
  },
  'authorization-resource': {
    description: 'Authorization resource',
    decode: AuthorizationResource.fromJSON,
  },
  jwk: { description: 'JSON Web Key', decode: (json: unknown) => Jwk.fromJSON(json) },
} as const satisfies Record<string, MessageKind>;

export type MessageKindName = keyof typeof MESSAGE_KINDS;

export function isMessageKind(value: string): value is MessageKindName {
  return Object.prototype.hasOwnProperty.call(MESSAGE_KINDS, value);
}
