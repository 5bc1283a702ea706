import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { PersistenceError } from '../../src/errors.js';
import { fileSize, readTextOrNull, writeFileAtomic, writeJsonAtomic } from '../../src/persistedFile.js';
import { mkTmpDir } from '../_fakes.js';

describe('persistedFile', () => {
  it('creates parent directories and leaves no temp file behind', async () => {
    const dir = await mkTmpDir();
    const file = path.join(dir, 'nested', 'a.conf');

    await writeFileAtomic(file, 'hello\n');

    expect(await fs.readFile(file, 'utf8')).toBe('hello\n');
    expect(await fs.readdir(path.dirname(file))).toEqual(['a.conf']);
  });

  it('writes pretty JSON with a trailing newline', async () => {
    const dir = await mkTmpDir();
    const file = path.join(dir, 'list.json');

    await writeJsonAtomic(file, ['a.example']);

    expect(await fs.readFile(file, 'utf8')).toBe('[\n  "a.example"\n]\n');
  });

  it('wraps write failures and keeps the previous file', async () => {
    const dir = await mkTmpDir();
    const file = path.join(dir, 'a.conf');
    await fs.writeFile(file, 'old');
    await fs.mkdir(`${file}.tmp`);
    await fs.writeFile(path.join(`${file}.tmp`, 'blocker'), '');

    const err = await writeFileAtomic(file, 'new').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PersistenceError);
    expect(await fs.readFile(file, 'utf8')).toBe('old');
  });

  it('reads missing files as null', async () => {
    const dir = await mkTmpDir();
    expect(await readTextOrNull(path.join(dir, 'missing'))).toBeNull();
    expect(await fileSize(path.join(dir, 'missing'))).toBeNull();
  });
});
