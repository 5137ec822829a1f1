import { Crypto } from '@peculiar/webcrypto';
import { cryptoProvider } from '@peculiar/x509';

/**
 * WebCrypto implementation used for certificate and CSR handling: Node's
 * global one when present, otherwise @peculiar/webcrypto.
 */
export const provider: Crypto =
  globalThis.crypto && 'subtle' in globalThis.crypto ? (globalThis.crypto as Crypto) : new Crypto();

cryptoProvider.set(provider);
