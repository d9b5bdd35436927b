import { describe, it, expect } from 'vitest';
import type { OutlineEntry } from '@shared/schema';
import {
  buildOutlineStructure,
  classifyNumber,
  parseChapterTitle,
  parseSectionTitle,
} from '../../server/services/outlineBuilder';

const entry = (depth: number, title: string, page = 1): OutlineEntry => ({ depth, title, page });

describe('Outline Builder', () => {
  describe('Title parsing', () => {
    it('should parse chapter numbers with and without the marker', () => {
      expect(parseChapterTitle('1 Introduction')).toEqual({ number: '1', title: 'Introduction' });
      expect(parseChapterTitle('Глава 2. Учет')).toEqual({ number: '2', title: 'Учет' });
      expect(parseChapterTitle('глава 3 Итоги')).toEqual({ number: '3', title: 'Итоги' });
      expect(parseChapterTitle('Chapter 7 Results', 'Chapter')).toEqual({ number: '7', title: 'Results' });
    });

    it('should return an empty number when the chapter title has none', () => {
      expect(parseChapterTitle('  Предисловие ')).toEqual({ number: '', title: 'Предисловие' });
    });

    it('should capture the whole dotted numeral of a section title', () => {
      expect(parseSectionTitle('2 Second')).toEqual({ number: '2', title: 'Second' });
      expect(parseSectionTitle('2.1. Title')).toEqual({ number: '2.1', title: 'Title' });
      expect(parseSectionTitle('2.1.3 Deep')).toEqual({ number: '2.1.3', title: 'Deep' });
      expect(parseSectionTitle('Appendix')).toEqual({ number: '', title: 'Appendix' });
    });
  });

  describe('Numbering classification', () => {
    it('should classify section, subsection and deeper numbers', () => {
      expect(classifyNumber('2')).toBe('section');
      expect(classifyNumber('2.1')).toBe('subsection');
      expect(classifyNumber('2.1.3')).toBe('unclassified');
    });

    it('should attach 2.1 under section 2 and discard 2.1.3 with a warning', () => {
      const { structure, warnings } = buildOutlineStructure([
        entry(1, '1 A'),
        entry(2, '2 Second'),
        entry(3, '2.1 Child'),
        entry(3, '2.1.3 Deep'),
      ]);

      const section = structure.get('1')?.sections.get('2');
      expect(section?.title).toBe('Second');
      expect(Array.from(section?.subsections.keys() ?? [])).toEqual(['2.1']);
      expect(warnings).toEqual([
        {
          code: 'unclassified-number',
          message: 'Number "2.1.3" is neither a section nor a subsection number',
          number: '2.1.3',
          entryIndex: 3,
        },
      ]);
    });
  });

  describe('Chapter titles', () => {
    it('should borrow the next entry title for an untitled chapter marker', () => {
      const { structure, warnings } = buildOutlineStructure([
        entry(1, 'Глава 4', 10),
        entry(2, '  Налоги ', 10),
      ]);

      expect(structure.get('4')?.title).toBe('Налоги');
      expect(warnings.map(w => w.code)).toEqual(['malformed-entry']);
    });

    it('should leave the title empty when the untitled chapter is the last entry', () => {
      const { structure } = buildOutlineStructure([entry(1, 'Глава 5')]);
      expect(structure.get('5')?.title).toBe('');
    });
  });

  describe('Discarded entries', () => {
    it('should drop chapters without a number and sections without a chapter', () => {
      const { structure, warnings } = buildOutlineStructure([
        entry(1, 'Предисловие'),
        entry(2, '1 Orphan'),
      ]);

      expect(structure.size).toBe(0);
      expect(warnings.map(w => [w.code, w.entryIndex])).toEqual([
        ['malformed-entry', 0],
        ['orphan-entry', 1],
      ]);
    });

    it('should keep the previous chapter active after an unnumbered chapter entry', () => {
      const { structure } = buildOutlineStructure([
        entry(1, '1 A'),
        entry(1, 'Приложения'),
        entry(2, '3 Late'),
      ]);

      expect(structure.get('1')?.sections.get('3')?.title).toBe('Late');
    });

    it('should report entries nested deeper than subsections', () => {
      const { warnings } = buildOutlineStructure([entry(1, '1 A'), entry(4, '1.1.1.1 Too deep')]);
      expect(warnings.map(w => w.code)).toEqual(['unsupported-depth']);
    });
  });

  describe('Implicit sections', () => {
    it('should create an untitled section for a subsection with no section entry', () => {
      const { structure, warnings } = buildOutlineStructure([
        entry(1, '1 A'),
        entry(3, '1.1 Orphan sub'),
      ]);

      const section = structure.get('1')?.sections.get('1');
      expect(section?.title).toBe('');
      expect(section?.subsections.get('1.1')?.title).toBe('Orphan sub');
      expect(warnings.map(w => w.code)).toEqual(['implicit-section']);
    });

    it('should not reuse the previous chapter section after a new chapter starts', () => {
      const { structure } = buildOutlineStructure([
        entry(1, '1 A'),
        entry(2, '1 S'),
        entry(1, '2 B'),
        entry(3, '2.1 X'),
      ]);

      expect(structure.get('1')?.sections.get('1')?.subsections.size).toBe(0);
      expect(structure.get('2')?.sections.get('2')?.subsections.get('2.1')?.title).toBe('X');
    });
  });

  describe('Ordering and duplicates', () => {
    it('should keep outline order rather than numeric order', () => {
      const { structure } = buildOutlineStructure([entry(1, '10 Ten'), entry(1, '2 Two')]);
      expect(Array.from(structure.keys())).toEqual(['10', '2']);
    });

    it('should let a duplicate number replace the earlier node in place', () => {
      const { structure, warnings } = buildOutlineStructure([
        entry(1, '1 A'),
        entry(2, '1 X'),
        entry(2, '2 Y'),
        entry(2, '1 Z'),
      ]);

      const sections = structure.get('1')?.sections;
      expect(Array.from(sections?.keys() ?? [])).toEqual(['1', '2']);
      expect(sections?.get('1')?.title).toBe('Z');
      expect(warnings.map(w => [w.code, w.number])).toEqual([['duplicate-number', '1']]);
    });
  });
});
