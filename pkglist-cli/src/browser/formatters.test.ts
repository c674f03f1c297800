import { describe, it, expect } from 'vitest';
import { makePackage } from 'pkglist-shared/testing';
import { describeInstallState, fitWidth, formatPageIndicator, formatVersionLabel, nextProgress, truncate } from './formatters';

describe('truncate', () => {
  it('leaves short text alone', () => {
    expect(truncate('hello', 10)).toBe('hello');
  });

  it('cuts long text and appends an ellipsis', () => {
    expect(truncate('hello world', 8)).toBe('hello...');
  });

  it('handles tiny widths', () => {
    expect(truncate('hello', 2)).toBe('he');
    expect(truncate('hello', 0)).toBe('');
  });
});

describe('fitWidth', () => {
  it('pads to the width', () => {
    expect(fitWidth('ab', 5)).toBe('ab   ');
  });

  it('cuts to the width', () => {
    expect(fitWidth('abcdefgh', 6)).toBe('abc...');
  });
});

describe('formatVersionLabel', () => {
  it('marks the installed version', () => {
    const pkg = makePackage('a', { versions: ['2.0.0', '1.0.0'], installed: '1.0.0' });
    expect(formatVersionLabel(pkg.versions[1])).toBe('1.0.0 (installed)');
    expect(formatVersionLabel(pkg.versions[0])).toBe('2.0.0');
    expect(formatVersionLabel(undefined)).toBe('-');
  });
});

describe('describeInstallState', () => {
  it('summarizes install and update state', () => {
    expect(describeInstallState(makePackage('a'))).toBe('not installed');
    expect(describeInstallState(makePackage('a', { installed: '1.0.0' }))).toBe('1.0.0');
    expect(describeInstallState(makePackage('a', { versions: ['2.0.0', '1.0.0'], installed: '1.0.0' })))
      .toBe('1.0.0 → 2.0.0');
  });
});

describe('nextProgress', () => {
  it('cycles through the demo progress states', () => {
    expect(nextProgress('none')).toBe('downloading');
    expect(nextProgress('downloading')).toBe('installing');
    expect(nextProgress('installing')).toBe('none');
    expect(nextProgress('removing')).toBe('none');
  });
});

describe('formatPageIndicator', () => {
  it('reports the page holding the top of the window', () => {
    expect(formatPageIndicator(0, 10, 4)).toBe('page 1/3');
    expect(formatPageIndicator(5, 10, 4)).toBe('page 2/3');
    expect(formatPageIndicator(6, 10, 4)).toBe('page 2/3');
  });

  it('is empty before the viewport is known or with no rows', () => {
    expect(formatPageIndicator(0, 10, 0)).toBe('');
    expect(formatPageIndicator(0, 0, 4)).toBe('');
  });
});
