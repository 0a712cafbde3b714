import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createOutputSession, processOutput, truncationNote, writeArtifact } from '../src/output/output.js';

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'makegate-output-test-'));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('createOutputSession', () => {
  it('names the directory after the session id without creating it', async () => {
    const session = createOutputSession(root, 'abcd1234');
    expect(session.directory).toBe(join(root, 'makegate-abcd1234'));
    expect(await readdir(root)).toEqual([]);
  });

  it('generates an 8-hex-digit id', () => {
    expect(createOutputSession(root).id).toMatch(/^[0-9a-f]{8}$/);
  });

  it('creates the directory once for concurrent callers', async () => {
    const session = createOutputSession(root, 'shared');
    const [a, b] = await Promise.all([session.ensureDirectory(), session.ensureDirectory()]);
    expect(a).toBe(session.directory);
    expect(b).toBe(session.directory);
    expect(await readdir(root)).toEqual(['makegate-shared']);
  });
});

describe('writeArtifact', () => {
  it('writes <target>-<ms>.log and suffixes collisions', async () => {
    const session = createOutputSession(root, 's1');
    const first = await writeArtifact(session, 'build', 'one', 1700000000000);
    const second = await writeArtifact(session, 'build', 'two', 1700000000000);
    const third = await writeArtifact(session, 'build', 'three', 1700000000000);

    expect(first.path).toBe(join(session.directory, 'build-1700000000000.log'));
    expect(second.path).toBe(join(session.directory, 'build-1700000000000-1.log'));
    expect(third.path).toBe(join(session.directory, 'build-1700000000000-2.log'));
    expect(await readFile(second.path, 'utf-8')).toBe('two');
  });
});

describe('truncationNote', () => {
  it('mentions the artifact when there is one', () => {
    expect(truncationNote(10, 50)).toBe('\n\n[output truncated: showing 10 of 50 characters]');
    expect(truncationNote(10, 50, { path: '/tmp/x.log' }))
      .toBe('\n\n[output truncated: showing 10 of 50 characters]\n[full output: /tmp/x.log]');
  });
});

describe('processOutput', () => {
  it('returns output untouched with no limit and no file', async () => {
    const session = createOutputSession(root, 's2');
    const out = await processOutput('a'.repeat(100), 'test', { maxOutputChars: 0, writeToFile: false }, session);
    expect(out).toEqual({ text: 'a'.repeat(100), truncated: false, originalLength: 100 });
    expect(await readdir(root)).toEqual([]);
  });

  it('does not truncate output at exactly the limit', async () => {
    const session = createOutputSession(root, 's3');
    const out = await processOutput('abcde', 'test', { maxOutputChars: 5, writeToFile: false }, session);
    expect(out.text).toBe('abcde');
    expect(out.truncated).toBe(false);
  });

  it('truncates to the limit and appends a note', async () => {
    const session = createOutputSession(root, 's4');
    const out = await processOutput('abcdefghij', 'test', { maxOutputChars: 4, writeToFile: false }, session);
    expect(out.text).toBe('abcd\n\n[output truncated: showing 4 of 10 characters]');
    expect(out.truncated).toBe(true);
    expect(out.originalLength).toBe(10);
    expect(out.artifact).toBeUndefined();
  });

  it('does not split a surrogate pair at the limit', async () => {
    const session = createOutputSession(root, 's8');
    const out = await processOutput('ab\u{1F600}cd', 'test', { maxOutputChars: 3, writeToFile: false }, session);
    expect(out.text).toBe('ab\n\n[output truncated: showing 2 of 6 characters]');
    expect(out.originalLength).toBe(6);
  });

  it('writes the full output and points to it from the note', async () => {
    const session = createOutputSession(root, 's5');
    const out = await processOutput('abcdefghij', 'build', { maxOutputChars: 4, writeToFile: true }, session);

    const path = out.artifact?.path;
    if (path === undefined) throw new Error('expected an artifact');
    expect(path.startsWith(join(session.directory, 'build-'))).toBe(true);
    expect(await readFile(path, 'utf-8')).toBe('abcdefghij');
    expect(out.text).toBe(`abcd\n\n[output truncated: showing 4 of 10 characters]\n[full output: ${path}]`);
  });

  it('writes the file even when nothing is truncated', async () => {
    const session = createOutputSession(root, 's6');
    const out = await processOutput('short', 'lint', { maxOutputChars: 0, writeToFile: true }, session);
    expect(out.text).toBe('short');
    expect(out.artifact).toBeDefined();
  });

  it('still returns the text when the file cannot be written', async () => {
    // a regular file where the temp directory should be
    const blocker = join(root, 'not-a-dir');
    await writeFile(blocker, '');
    const session = createOutputSession(blocker, 's7');

    const out = await processOutput('abcdefghij', 'build', { maxOutputChars: 4, writeToFile: true }, session);
    expect(out.artifact).toBeUndefined();
    expect(out.persistError).toBeDefined();
    expect(out.text).toBe('abcd\n\n[output truncated: showing 4 of 10 characters]');
  });
});
