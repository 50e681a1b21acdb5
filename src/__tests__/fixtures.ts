import { mkdir, mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { encode, Token, Type } from 'cborg';

export async function createTempDir(label: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `bench-extract-${label}-`));
}

// Every number becomes a float64 (0xfb) item, whole values included.
const FLOAT64_NUMBERS = {
  float64: true,
  typeEncoders: {
    number: (value: number) => [new Token(Type.float, value)],
  },
};

/** Numbers encoded the way a harness writes f64 statistics. */
export function encodeFloatDocument(value: unknown): Uint8Array {
  return encode(value, FLOAT64_NUMBERS);
}

/** Default encoding: whole numbers become CBOR integers. */
export function encodeDocument(value: unknown): Uint8Array {
  return encode(value);
}

/** CBOR document shaped like a harness estimates file. */
export function estimatesDocument(pointEstimate: unknown): Uint8Array {
  return encodeFloatDocument({
    estimates: {
      mean: { point_estimate: 1.5, standard_error: 0.25 },
      median: {
        confidence_interval: { confidence_level: 0.95, lower_bound: 0.5, upper_bound: 2.5 },
        point_estimate: pointEstimate,
        standard_error: 0.125,
      },
    },
  });
}

export async function writeFixture(
  root: string,
  relativePath: string,
  content: Uint8Array | string
): Promise<string> {
  const fullPath = join(root, relativePath);
  await mkdir(dirname(fullPath), { recursive: true });
  await writeFile(fullPath, content);
  return fullPath;
}
