import { errorCode } from '@reqtrace/core';

import type { DecodedText } from '../types';

interface Candidate {
  encoding: DecodedText['encoding'];
  decode: (bytes: Uint8Array) => string | undefined;
}

const startsWith = (bytes: Uint8Array, prefix: number[]): boolean =>
  bytes.length >= prefix.length && prefix.every((value, index) => bytes[index] === value);

const decodeUtf16be = (bytes: Uint8Array): string => {
  const even = Buffer.from(bytes.subarray(0, bytes.length - (bytes.length % 2)));
  return even.swap16().toString('utf16le');
};

const strictUtf8 = (bytes: Uint8Array): string | undefined => {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    if (errorCode(error) === 'ERR_ENCODING_INVALID_ENCODED_DATA') {
      return undefined;
    }
    throw error;
  }
};

const byteOrderMarks: Array<{ bytes: number[]; candidate: Candidate }> = [
  {
    bytes: [0xef, 0xbb, 0xbf],
    candidate: { encoding: 'utf-8', decode: (input) => strictUtf8(input.subarray(3)) },
  },
  {
    bytes: [0xff, 0xfe],
    candidate: { encoding: 'utf-16le', decode: (input) => Buffer.from(input.subarray(2)).toString('utf16le') },
  },
  {
    bytes: [0xfe, 0xff],
    candidate: { encoding: 'utf-16be', decode: (input) => decodeUtf16be(input.subarray(2)) },
  },
];

/** Tried in order: the encoding a BOM declares, then strict UTF-8. */
const candidatesFor = (bytes: Uint8Array): Candidate[] => [
  ...byteOrderMarks.filter((mark) => startsWith(bytes, mark.bytes)).map((mark) => mark.candidate),
  { encoding: 'utf-8', decode: strictUtf8 },
];

/** Never throws: bytes no candidate accepts are dropped by the final lossy pass. */
export const decodeText = (bytes: Uint8Array): DecodedText => {
  for (const candidate of candidatesFor(bytes)) {
    const text = candidate.decode(bytes);
    if (text !== undefined) {
      return { text, encoding: candidate.encoding, lossy: false };
    }
  }
  const text = new TextDecoder('utf-8').decode(bytes).replace(/\uFFFD/g, '');
  return { text, encoding: 'utf-8', lossy: true };
};
