import crypto from 'crypto';
import { customAlphabet } from 'nanoid';
import { ConfigurationError } from '@/lib/errors';

export const ID_FORMATS = ['uuid', 'short', 'custom'] as const;
export type IdFormat = (typeof ID_FORMATS)[number];

// Flickr base58: no 0/O/I/l.
const SHORT_ALPHABET = '123456789abcdefghijkmnopqrstuvwxyzABCDEFGHJKLMNPQRSTUVWXYZ';
const SHORT_LENGTH = 22;
const CUSTOM_ALPHABET = '23456789ABCDEFGHJKMNPQRSTUVWXYZ';
export const DEFAULT_CUSTOM_LENGTH = 12;
const MIN_CUSTOM_LENGTH = 6;
const MAX_CUSTOM_LENGTH = 32;

export interface IdGenerator {
  readonly format: IdFormat;
  newId(): string;
}

export interface IdGeneratorOptions {
  customLength?: number;
}

export function isIdFormat(value: string): value is IdFormat {
  return (ID_FORMATS as readonly string[]).includes(value);
}

export function createIdGenerator(format: string, options: IdGeneratorOptions = {}): IdGenerator {
  if (!isIdFormat(format)) {
    throw new ConfigurationError(
      `Unsupported ID format: '${format}'. Must be one of: ${ID_FORMATS.join(', ')}`,
      { format }
    );
  }

  switch (format) {
    case 'uuid':
      return { format, newId: () => crypto.randomUUID() };
    case 'short':
      return { format, newId: customAlphabet(SHORT_ALPHABET, SHORT_LENGTH) };
    case 'custom': {
      const length = options.customLength ?? DEFAULT_CUSTOM_LENGTH;
      if (!Number.isInteger(length) || length < MIN_CUSTOM_LENGTH || length > MAX_CUSTOM_LENGTH) {
        throw new ConfigurationError(
          `Custom ID length must be an integer between ${MIN_CUSTOM_LENGTH} and ${MAX_CUSTOM_LENGTH}, got ${length}`,
          { customLength: length }
        );
      }
      return { format, newId: customAlphabet(CUSTOM_ALPHABET, length) };
    }
  }
}
