/**
 * Tests for string normalization utilities.
 */
import { describe, it, expect } from 'vitest';
import {
  normalizeIdentifier,
  normalizeExtension,
  normalizeSubfolder,
  dedupe,
  longestMatchingExtension,
  splitCompoundSuffix,
} from '../../../src/utils/string.js';

describe('normalizeIdentifier', () => {
  it('should lowercase and collapse separators', () => {
    expect(normalizeIdentifier('Documents/PDF')).toBe('documents_pdf');
    expect(normalizeIdentifier('  PDF Documents ')).toBe('pdf_documents');
  });

  it('should trim leading and trailing underscores', () => {
    expect(normalizeIdentifier('--Disk Images!!')).toBe('disk_images');
  });

  it('should return empty string for punctuation only', () => {
    expect(normalizeIdentifier('///')).toBe('');
  });
});

describe('normalizeExtension', () => {
  it('should add a leading dot and lowercase', () => {
    expect(normalizeExtension('PDF')).toBe('.pdf');
    expect(normalizeExtension(' .Tar.GZ ')).toBe('.tar.gz');
  });

  it('should throw on blank input', () => {
    expect(() => normalizeExtension('  ')).toThrow('extension cannot be empty');
  });
});

describe('normalizeSubfolder', () => {
  it('should trim slashes and whitespace', () => {
    expect(normalizeSubfolder(' /Documents/PDF/ ')).toBe('Documents/PDF');
  });

  it('should throw when nothing is left', () => {
    expect(() => normalizeSubfolder(' // ')).toThrow('subfolder cannot be empty');
  });
});

describe('dedupe', () => {
  it('should keep first occurrences in order', () => {
    expect(dedupe(['.b', '.a', '.b', '.c', '.a'])).toEqual(['.b', '.a', '.c']);
  });
});

describe('longestMatchingExtension', () => {
  it('should prefer the longest suffix', () => {
    expect(longestMatchingExtension('backup.tar.gz', ['.gz', '.tar.gz'])).toBe('.tar.gz');
  });

  it('should compare case-insensitively', () => {
    expect(longestMatchingExtension('REPORT.PDF', ['.pdf'])).toBe('.pdf');
  });

  it('should return null when nothing matches', () => {
    expect(longestMatchingExtension('notes.txt', ['.pdf', '.doc'])).toBeNull();
  });
});

describe('splitCompoundSuffix', () => {
  it('should split at the first dot', () => {
    expect(splitCompoundSuffix('archive.tar.gz')).toEqual(['archive', '.tar.gz']);
    expect(splitCompoundSuffix('doc.pdf')).toEqual(['doc', '.pdf']);
  });

  it('should keep leading dots in the base', () => {
    expect(splitCompoundSuffix('.env')).toEqual(['.env', '']);
    expect(splitCompoundSuffix('.config.json')).toEqual(['.config', '.json']);
  });

  it('should treat names without a dot or with a trailing dot as suffixless', () => {
    expect(splitCompoundSuffix('README')).toEqual(['README', '']);
    expect(splitCompoundSuffix('weird.')).toEqual(['weird.', '']);
  });
});
