import { ErrorMessage } from '../../index.js';
import { heading, kv, render } from '../logger.js';
import { readJsonInput, resolveUnknownFieldPolicy } from '../utils/config.js';

/** Describe an ACME error document. */
export async function handleExplainErrorCommand(options: {
  file?: string;
  rejectUnknown?: boolean;
}): Promise<void> {
  const unknownFields = resolveUnknownFieldPolicy(options.rejectUnknown);
  const json = await readJsonInput(options.file);
  if (!ErrorMessage.isErrorJSON(json)) {
    render.warn('Input has no urn:acme:error: type; decoding anyway');
  }
  const problem = ErrorMessage.fromJSON(json, { unknownFields });

  heading('ACME Error');
  kv('Type', problem.typ ?? '(none)');
  if (problem.description) kv('Description', problem.description);
  if (problem.title) kv('Title', problem.title);
  if (problem.detail) kv('Detail', problem.detail);
  render.line();
  render.line(problem.toString());
}
