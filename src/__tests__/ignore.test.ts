import { describe, it } from 'node:test';
import assert from 'node:assert';
import { isIgnoredDirectoryName, isIgnoredFileName, isMarkdownPath, shouldDescend, shouldIndex } from '../ignore.js';

describe('shouldIndex', () => {
  it('indexes ordinary notes and attachments', () => {
    assert.strictEqual(shouldIndex('coffee.md'), true);
    assert.strictEqual(shouldIndex('notes/coffee.md'), true);
    assert.strictEqual(shouldIndex('assets/diagram.png'), true);
  });

  it('skips anything under a hidden or dependency directory', () => {
    assert.strictEqual(shouldIndex('.git/config'), false);
    assert.strictEqual(shouldIndex('.obsidian/workspace.json'), false);
    assert.strictEqual(shouldIndex('node_modules/pkg/readme.md'), false);
    assert.strictEqual(shouldIndex('docs/build/out.md'), false);
  });

  it('skips OS metadata, editor swap files and logs', () => {
    assert.strictEqual(shouldIndex('notes/.DS_Store'), false);
    assert.strictEqual(shouldIndex('Thumbs.db'), false);
    assert.strictEqual(shouldIndex('draft.md~'), false);
    assert.strictEqual(shouldIndex('~$report.docx'), false);
    assert.strictEqual(shouldIndex('notes/.coffee.md.swp'), false);
    assert.strictEqual(shouldIndex('debug.log'), false);
    assert.strictEqual(shouldIndex('notes/coffee.md.1234.5678.tmp'), false);
  });

  it('accepts Windows separators', () => {
    assert.strictEqual(shouldIndex('notes\\coffee.md'), true);
    assert.strictEqual(shouldIndex('node_modules\\pkg\\readme.md'), false);
  });

  it('rejects an empty path', () => {
    assert.strictEqual(shouldIndex(''), false);
  });
});

describe('shouldDescend', () => {
  it('prunes ignored directories at any depth', () => {
    assert.strictEqual(shouldDescend('specs'), true);
    assert.strictEqual(shouldDescend('specs/api'), true);
    assert.strictEqual(shouldDescend('specs/.obsidian'), false);
    assert.strictEqual(shouldDescend('build'), false);
    assert.strictEqual(shouldDescend('src/__pycache__'), false);
  });
});

describe('name predicates', () => {
  it('treats dot-directories as ignored', () => {
    assert.strictEqual(isIgnoredDirectoryName('.venv'), true);
    assert.strictEqual(isIgnoredDirectoryName('venv'), true);
    assert.strictEqual(isIgnoredDirectoryName('journal'), false);
  });

  it('matches ignored extensions case-insensitively', () => {
    assert.strictEqual(isIgnoredFileName('BACKUP.BAK'), true);
    assert.strictEqual(isIgnoredFileName('backup.md'), false);
  });

  it('recognizes markdown extensions', () => {
    assert.strictEqual(isMarkdownPath('Notes/Coffee.MD'), true);
    assert.strictEqual(isMarkdownPath('readme.markdown'), true);
    assert.strictEqual(isMarkdownPath('data.txt'), false);
  });
});
