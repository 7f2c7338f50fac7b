import {
  compileFilters,
  decodeListFlags,
  globPattern,
  predicate,
  recursive,
  toSpecifications,
  typeMask,
  visibility,
} from './filter';
import { ListFlags, TypeBits, VisibilityBits } from './filter.types';
import type { FilterSubject } from './filter.types';
import type { NodeType } from '../adapter';
import { InvalidFilterError } from '../errors';
import { normalize } from '../pathname';

function subject(path: string, type: NodeType, directory: boolean = type === 'directory'): FilterSubject {
  return {
    pathname: normalize(path),
    getType: async () => type,
    isDirectory: async () => directory,
  };
}

const file = subject('/a/b.txt', 'file');
const dir = subject('/a/c', 'directory');
const link = subject('/a/l', 'link');
const linkToDir = subject('/a/ld', 'link', true);
const hidden = subject('/a/.env', 'file');
const special = subject('/a/fifo', 'unknown');

describe('FilterEngine', () => {
  describe('1. Empty filter list', () => {
    it('should accept every node and never recurse', async () => {
      const evaluator = compileFilters([]);

      for (const node of [file, dir, link, hidden, special]) {
        expect(await evaluator.accepts(node)).toBe(true);
      }
      expect(evaluator.recursive).toBe(false);
      expect(await evaluator.recursesInto(dir)).toBe(false);
    });
  });

  describe('2. Type masks', () => {
    it('should OR two type masks together', async () => {
      const evaluator = compileFilters([typeMask(TypeBits.FILE), typeMask(TypeBits.DIRECTORY)]);

      expect(await evaluator.accepts(file)).toBe(true);
      expect(await evaluator.accepts(dir)).toBe(true);
      expect(await evaluator.accepts(link)).toBe(false);
    });

    it('should match links by their own type, not their target', async () => {
      const links = compileFilters([typeMask(TypeBits.LINK)]);
      const directories = compileFilters([typeMask(TypeBits.DIRECTORY)]);

      expect(await links.accepts(linkToDir)).toBe(true);
      expect(await directories.accepts(linkToDir)).toBe(false);
    });

    it('should match every non-link with OPAQUE', async () => {
      const evaluator = compileFilters([typeMask(TypeBits.OPAQUE)]);

      expect(await evaluator.accepts(file)).toBe(true);
      expect(await evaluator.accepts(dir)).toBe(true);
      expect(await evaluator.accepts(special)).toBe(true);
      expect(await evaluator.accepts(link)).toBe(false);
    });

    it('should reject masks with no bits or unknown bits', () => {
      expect(() => compileFilters([typeMask(0)])).toThrow(InvalidFilterError);
      expect(() => compileFilters([typeMask(0x10)])).toThrow('Invalid listing filter: invalid type mask 0x10');
    });
  });

  describe('3. Visibility masks', () => {
    it('should key visibility off the hidden prefix', async () => {
      const onlyHidden = compileFilters([visibility(VisibilityBits.HIDDEN)]);
      const onlyVisible = compileFilters([visibility(VisibilityBits.VISIBLE)]);

      expect(await onlyHidden.accepts(hidden)).toBe(true);
      expect(await onlyHidden.accepts(file)).toBe(false);
      expect(await onlyVisible.accepts(hidden)).toBe(false);
      expect(await onlyVisible.accepts(file)).toBe(true);
    });

    it('should honour a custom hidden prefix', async () => {
      const evaluator = compileFilters([visibility(VisibilityBits.HIDDEN)], { hiddenPrefix: '_' });

      expect(await evaluator.accepts(subject('/a/_draft', 'file'))).toBe(true);
      expect(await evaluator.accepts(hidden)).toBe(false);
    });

    it('should reject an invalid mask and an empty prefix', () => {
      expect(() => compileFilters([visibility(4)])).toThrow(InvalidFilterError);
      expect(() => compileFilters([], { hiddenPrefix: '' })).toThrow('Invalid listing filter: hidden prefix must not be empty');
    });
  });

  describe('4. Glob patterns', () => {
    it('should OR patterns against the basename', async () => {
      const evaluator = compileFilters([globPattern('*.md'), globPattern('*.txt')]);

      expect(await evaluator.accepts(file)).toBe(true);
      expect(await evaluator.accepts(subject('/docs/README.md', 'file'))).toBe(true);
      expect(await evaluator.accepts(subject('/docs/build.sh', 'file'))).toBe(false);
    });

    it('should match case-sensitively and support ? and classes', async () => {
      expect(await compileFilters(['*.MD']).accepts(subject('/README.md', 'file'))).toBe(false);
      expect(await compileFilters(['b.t?t']).accepts(file)).toBe(true);
      expect(await compileFilters(['[abc].txt']).accepts(file)).toBe(true);
      expect(await compileFilters(['[xyz].txt']).accepts(file)).toBe(false);
    });

    it('should negate bracket classes with a leading !', async () => {
      const evaluator = compileFilters(['[!a]*']);

      expect(await evaluator.accepts(subject('/x/b1', 'file'))).toBe(true);
      expect(await evaluator.accepts(subject('/x/a1', 'file'))).toBe(false);
    });

    it('should read a leading ! as a literal character', async () => {
      const evaluator = compileFilters(['!draft']);

      expect(await evaluator.accepts(subject('/x/notes', 'file'))).toBe(false);
      expect(await evaluator.accepts(subject('/x/!draft', 'file'))).toBe(true);
    });

    it('should let * match a leading dot', async () => {
      expect(await compileFilters(['*']).accepts(hidden)).toBe(true);
    });

    it('should reject an empty pattern', () => {
      expect(() => compileFilters([''])).toThrow(InvalidFilterError);
    });
  });

  describe('5. Predicates', () => {
    it('should require every predicate to hold', async () => {
      const evaluator = compileFilters([
        predicate(node => node.pathname.depth === 2),
        predicate(async node => node.pathname.basename().startsWith('b')),
      ]);

      expect(await evaluator.accepts(file)).toBe(true);
      expect(await evaluator.accepts(dir)).toBe(false);
      expect(await evaluator.accepts(subject('/b.txt', 'file'))).toBe(false);
    });

    it('should not evaluate predicates once another category rejects', async () => {
      const test = jest.fn(() => true);
      const evaluator = compileFilters([globPattern('*.md'), predicate(test)]);

      expect(await evaluator.accepts(file)).toBe(false);
      expect(test).not.toHaveBeenCalled();
    });

    it('should AND categories together', async () => {
      const evaluator = compileFilters([
        visibility(VisibilityBits.VISIBLE),
        '*.md',
        (node: FilterSubject) => node.pathname.basename().startsWith('README'),
      ]);

      expect(await evaluator.accepts(subject('/docs/README.md', 'file'))).toBe(true);
      expect(await evaluator.accepts(subject('/docs/.README.md', 'file'))).toBe(false);
      expect(await evaluator.accepts(subject('/docs/NOTES.md', 'file'))).toBe(false);
      expect(await evaluator.accepts(subject('/docs/README.txt', 'file'))).toBe(false);
    });
  });

  describe('6. Recursion', () => {
    it('should recurse into directories and links to directories only', async () => {
      const evaluator = compileFilters([recursive()]);

      expect(evaluator.recursive).toBe(true);
      expect(await evaluator.recursesInto(dir)).toBe(true);
      expect(await evaluator.recursesInto(linkToDir)).toBe(true);
      expect(await evaluator.recursesInto(file)).toBe(false);
      expect(await evaluator.recursesInto(link)).toBe(false);
    });

    it('should keep inclusion and reachability apart', async () => {
      const evaluator = compileFilters([recursive(), typeMask(TypeBits.FILE)]);

      expect(await evaluator.accepts(dir)).toBe(false);
      expect(await evaluator.recursesInto(dir)).toBe(true);
    });

    it('should let the last recursive specification win', async () => {
      const evaluator = compileFilters([recursive(true), recursive(false)]);

      expect(evaluator.recursive).toBe(false);
      expect(await evaluator.recursesInto(dir)).toBe(false);
    });
  });

  describe('7. ListFlags', () => {
    it('should decode flags into specifications', () => {
      expect(decodeListFlags(ListFlags.FILES | ListFlags.LINKS | ListFlags.HIDDEN | ListFlags.RECURSIVE)).toEqual([
        { kind: 'type', mask: TypeBits.FILE | TypeBits.LINK },
        { kind: 'visibility', mask: VisibilityBits.HIDDEN },
        { kind: 'recursive', enabled: true },
      ]);
      expect(decodeListFlags(ListFlags.DIRECTORIES)).toEqual([{ kind: 'type', mask: TypeBits.DIRECTORY }]);
    });

    it('should reject zero and unknown bits', () => {
      expect(() => decodeListFlags(0)).toThrow(InvalidFilterError);
      expect(() => decodeListFlags(16)).toThrow('Invalid listing filter: unknown list flags 0x10');
      expect(() => decodeListFlags(ListFlags.FILES | 16)).toThrow(InvalidFilterError);
    });

    it('should decode ALL as hidden and visible entries', async () => {
      expect(decodeListFlags(ListFlags.ALL)).toEqual([
        { kind: 'visibility', mask: VisibilityBits.HIDDEN | VisibilityBits.VISIBLE },
      ]);

      const evaluator = compileFilters([ListFlags.ALL | ListFlags.FILES]);
      expect(await evaluator.accepts(hidden)).toBe(true);
      expect(await evaluator.accepts(file)).toBe(true);
      expect(await evaluator.accepts(dir)).toBe(false);
    });

    it('should accept flags directly as filter input', async () => {
      const evaluator = compileFilters([ListFlags.DIRECTORIES | ListFlags.VISIBLE | ListFlags.RECURSIVE]);

      expect(evaluator.recursive).toBe(true);
      expect(await evaluator.accepts(dir)).toBe(true);
      expect(await evaluator.accepts(file)).toBe(false);
      expect(await evaluator.accepts(subject('/a/.git', 'directory'))).toBe(false);
    });
  });

  describe('8. toSpecifications()', () => {
    it('should tag shorthand inputs', () => {
      const test = (node: FilterSubject) => node.pathname.isRoot;
      const specs = toSpecifications(['*.ts', test, ListFlags.FILES, recursive()]);

      expect(specs).toEqual([
        { kind: 'glob', pattern: '*.ts' },
        { kind: 'predicate', test },
        { kind: 'type', mask: TypeBits.FILE },
        { kind: 'recursive', enabled: true },
      ]);
    });
  });
});
