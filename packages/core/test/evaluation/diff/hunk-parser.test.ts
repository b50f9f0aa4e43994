import { describe, expect, it } from 'vitest';

import { countHunks, parseFileHunks } from '../../../src/evaluation/diff/hunk-parser.js';

const TWO_FILE_DIFF = [
  'diff --git a/src/app.py b/src/app.py',
  'index 1111111..2222222 100644',
  '--- a/src/app.py',
  '+++ b/src/app.py',
  '@@ -1,2 +1,2 @@',
  '-x = 1',
  '+x = 2',
  ' y = 3',
  '@@ -10 +10 @@',
  '-def old():',
  '+def new():',
  'diff --git a/README.md b/README.md',
  '--- a/README.md',
  '+++ b/README.md',
  '@@ -1 +1 @@',
  '-Hello',
  '+Hi',
  '',
].join('\n');

describe('parseFileHunks', () => {
  it('groups hunks by the new-side file path', () => {
    const hunks = parseFileHunks(TWO_FILE_DIFF);

    expect([...hunks.keys()]).toEqual(['src/app.py', 'README.md']);
    expect(hunks.get('src/app.py')).toEqual([
      '@@ -1,2 +1,2 @@\n-x = 1\n+x = 2\n y = 3',
      '@@ -10 +10 @@\n-def old():\n+def new():',
    ]);
    expect(hunks.get('README.md')).toEqual(['@@ -1 +1 @@\n-Hello\n+Hi']);
    expect(countHunks(hunks)).toBe(3);
  });

  it('returns an empty map for empty or whitespace-only input', () => {
    expect(parseFileHunks('').size).toBe(0);
    expect(parseFileHunks('  \n\t\n').size).toBe(0);
  });

  it('returns an empty map when no file header is present', () => {
    const hunks = parseFileHunks('Replace the greeting with a shorter one.\n+ maybe this\n');
    expect(hunks.size).toBe(0);
  });

  it('keys a renamed file by its new path', () => {
    const diff = [
      '--- a/old_name.py',
      '+++ b/new_name.py',
      '@@ -1 +1 @@',
      '-a = 1',
      '+a = 2',
    ].join('\n');

    const hunks = parseFileHunks(diff);
    expect([...hunks.keys()]).toEqual(['new_name.py']);
  });

  it('opens no section for a deleted file on its own', () => {
    const diff = ['--- a/gone.py', '+++ /dev/null', '@@ -1 +0,0 @@', '-z = 1'].join('\n');
    expect(parseFileHunks(diff).size).toBe(0);
  });

  it('attaches hunks of a deleted file to the section already open', () => {
    const diff = [
      '--- a/app.py',
      '+++ b/app.py',
      '@@ -1 +1 @@',
      '-a = 1',
      '+a = 2',
      '--- a/gone.py',
      '+++ /dev/null',
      '@@ -1 +0,0 @@',
      '-z = 1',
    ].join('\n');

    expect(parseFileHunks(diff).get('app.py')).toEqual([
      '@@ -1 +1 @@\n-a = 1\n+a = 2',
      '@@ -1 +0,0 @@\n-z = 1',
    ]);
  });

  it('concatenates hunks when the same path appears twice', () => {
    const diff = [
      '--- a/app.py',
      '+++ b/app.py',
      '@@ -1 +1 @@',
      '+first = 1',
      '--- a/app.py',
      '+++ b/app.py',
      '@@ -9 +9 @@',
      '+second = 2',
    ].join('\n');

    expect(parseFileHunks(diff).get('app.py')).toEqual([
      '@@ -1 +1 @@\n+first = 1',
      '@@ -9 +9 @@\n+second = 2',
    ]);
  });

  it('treats CRLF line endings like LF', () => {
    const crlf = TWO_FILE_DIFF.replace(/\n/g, '\r\n');
    expect(parseFileHunks(crlf)).toEqual(parseFileHunks(TWO_FILE_DIFF));
  });

  it('drops lines that are not part of a hunk body', () => {
    const diff = [
      '--- a/app.py',
      '+++ b/app.py',
      '@@ -1 +1 @@',
      '+kept = 1',
      '\\ No newline at end of file',
    ].join('\n');

    expect(parseFileHunks(diff).get('app.py')).toEqual(['@@ -1 +1 @@\n+kept = 1']);
  });

  it('keeps removed comment lines and added lines that look like file headers', () => {
    const diff = [
      '--- a/schema.sql',
      '+++ b/schema.sql',
      '@@ -1,2 +1,2 @@',
      '--- old comment',
      '+++ new text',
      ' SELECT 1;',
    ].join('\n');

    expect(parseFileHunks(diff).get('schema.sql')).toEqual([
      '@@ -1,2 +1,2 @@\n--- old comment\n+++ new text\n SELECT 1;',
    ]);
  });
});
