import { Filesystem, createFilesystem } from './filesystem';
import { MemoryAdapter } from '../adapter/memory/memory_adapter';
import { FilesystemClosedError, InvalidPathError } from '../errors';
import type { Logger } from '../logger';
import { WINDOWS_CONVENTIONS } from '../pathname';

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  const record = (message: string) => {
    lines.push(message);
  };
  return { lines, debug: record, info: record, warn: record, error: record };
}

describe('Filesystem', () => {
  it('should produce nodes for canonical pathnames', () => {
    const fs = new Filesystem(new MemoryAdapter());

    expect(fs.getFile('docs/./api/../README.md').getPathname()).toBe('/docs/README.md');
    expect(fs.getRoot().getPathname()).toBe('/');
    expect(() => fs.getFile('/..')).toThrow(InvalidPathError);
  });

  it('should parse paths with the adapter conventions', () => {
    const fs = new Filesystem(new MemoryAdapter({ id: 'win', conventions: WINDOWS_CONVENTIONS }));

    expect(fs.id).toBe('win');
    expect(fs.getFile('d:\\data\\report.csv').getPathname()).toBe('D:/data/report.csv');
  });

  it('should apply defaults and options', () => {
    const defaults = new Filesystem(new MemoryAdapter());
    const custom = new Filesystem(new MemoryAdapter(), { hiddenPrefix: '_', maxLinkDepth: 4 });

    expect(defaults.hiddenPrefix).toBe('.');
    expect(defaults.maxLinkDepth).toBe(40);
    expect(custom.hiddenPrefix).toBe('_');
    expect(custom.maxLinkDepth).toBe(4);
  });

  it('should build a filesystem from configuration', () => {
    const fs = createFilesystem(new MemoryAdapter(), { hiddenPrefix: '~', maxLinkDepth: 7, logLevel: 'silent' });

    expect(fs.hiddenPrefix).toBe('~');
    expect(fs.maxLinkDepth).toBe(7);
  });

  it('should log its lifecycle', () => {
    const logger = recordingLogger();
    const fs = new Filesystem(new MemoryAdapter({ id: 'logged' }), { logger });

    fs.destroy();
    fs.destroy();

    expect(logger.lines).toEqual(['Filesystem created on adapter logged', 'Filesystem on adapter logged destroyed']);
  });

  it('should refuse adapter access once destroyed', () => {
    const fs = new Filesystem(new MemoryAdapter());
    const node = fs.getFile('/a');

    expect(fs.destroyed).toBe(false);
    fs.destroy();

    expect(fs.destroyed).toBe(true);
    expect(() => fs.getAdapter(node.pathname)).toThrow(FilesystemClosedError);
    expect(() => fs.getAdapter(node.pathname)).toThrow('Filesystem owning /a has been destroyed');
  });
});
