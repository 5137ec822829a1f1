import { Revocation } from '../../index.js';
import { render } from '../logger.js';

/** Print the revoke-certificate endpoint for a directory URL. */
export async function handleRevokeUrlCommand(directory: string): Promise<void> {
  render.line(Revocation.url(directory));
}
