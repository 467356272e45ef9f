import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { CurrencyDataErrorCodes } from '@curdata/currency-data';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { openOutputFile } from '../output-sink.js';

describe('openOutputFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'currency-data-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes bytes and closes the file', async () => {
    const target = path.join(dir, 'currency.data');

    const sink = (await openOutputFile(target))._unsafeUnwrap();
    (await sink.write(new Uint8Array([0x43, 0x75, 0x72, 0x44])))._unsafeUnwrap();
    (await sink.close())._unsafeUnwrap();

    expect(Array.from(await readFile(target))).toEqual([0x43, 0x75, 0x72, 0x44]);
  });

  it('fails to open a path in a missing directory', async () => {
    const target = path.join(dir, 'missing', 'currency.data');

    const error = (await openOutputFile(target))._unsafeUnwrapErr();

    expect(error.code).toBe(CurrencyDataErrorCodes.OutputWriteFailure);
    expect(error.message).toContain(`failed to open ${target}`);
  });
});
