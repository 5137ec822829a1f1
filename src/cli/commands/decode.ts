import { MESSAGE_KINDS, isMessageKind, type MessageKind } from '../../index.js';
import { render } from '../logger.js';
import { readJsonInput, resolveUnknownFieldPolicy } from '../utils/config.js';

export const OUTPUT_FORMATS = ['full', 'partial', 'hash'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Options for the decode command. */
export interface DecodeCommandOptions {
  kind: string;
  file?: string;
  format: string;
  rejectUnknown?: boolean;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/** Decode a message of the given kind and print it back in the chosen form. */
export async function handleDecodeCommand(options: DecodeCommandOptions): Promise<void> {
  if (!isMessageKind(options.kind)) {
    throw new Error(
      `Unknown message kind "${options.kind}". Known kinds: ${Object.keys(MESSAGE_KINDS).join(', ')}`,
    );
  }
  if (!isOutputFormat(options.format)) {
    throw new Error(`Unknown format "${options.format}". Use one of: ${OUTPUT_FORMATS.join(', ')}`);
  }

  const unknownFields = resolveUnknownFieldPolicy(options.rejectUnknown);
  const json = await readJsonInput(options.file);
  const kind: MessageKind = MESSAGE_KINDS[options.kind];
  const message = kind.decode(json, { unknownFields });

  switch (options.format) {
    case 'hash':
      render.line(message.hash());
      break;
    case 'partial':
      render.json(message.toPartialJSON());
      break;
    case 'full':
      render.json(message.toJSON());
      break;
  }
}
