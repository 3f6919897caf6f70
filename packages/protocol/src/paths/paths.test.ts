// Tests for logical path helpers

import { describe, it, expect } from 'vitest';
import {
  normalizePath,
  joinPath,
  fileName,
  extensionOf,
  baseName,
  extensionFromPattern,
  matchesPattern,
} from './paths.js';

describe('normalizePath', () => {
  it('uses forward slashes and drop redundant segments', () => {
    expect(normalizePath('Localizations\\ko.csv')).toBe('Localizations/ko.csv');
    expect(normalizePath('./Data//Items.json')).toBe('Data/Items.json');
    expect(normalizePath('/Localizations/')).toBe('Localizations');
  });
});

describe('joinPath', () => {
  it('joins folder and file', () => {
    expect(joinPath('Localizations/', 'en.csv')).toBe('Localizations/en.csv');
    expect(joinPath('', 'Items.json')).toBe('Items.json');
  });
});

describe('file name helpers', () => {
  it('splits name and extension', () => {
    expect(fileName('Localizations/ko.csv')).toBe('ko.csv');
    expect(extensionOf('Data/Items.JSON')).toBe('.json');
    expect(extensionOf('README')).toBe('');
    expect(extensionOf('.hidden')).toBe('');
    expect(baseName('Localizations/zh-CN.csv')).toBe('zh-CN');
  });

  it('reads the extension a pattern targets', () => {
    expect(extensionFromPattern('*.csv')).toBe('.csv');
    expect(extensionFromPattern('*')).toBe('.json');
    expect(extensionFromPattern(undefined)).toBe('.json');
  });
});

describe('matchesPattern', () => {
  it('matches wildcards', () => {
    expect(matchesPattern('en.csv', '*.csv')).toBe(true);
    expect(matchesPattern('en.json', '*.csv')).toBe(false);
    expect(matchesPattern('ko.csv', '??.csv')).toBe(true);
    expect(matchesPattern('zh-CN.csv', '??.csv')).toBe(false);
  });

  it('ignores case and treat regex characters literally', () => {
    expect(matchesPattern('EN.CSV', '*.csv')).toBe(true);
    expect(matchesPattern('enxcsv', '*.csv')).toBe(false);
  });
});
