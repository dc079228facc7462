import { DateResolutionError, StructuralError } from './errors';
import { buildMarkers, detectLineEnding, lineEndingFromSetting } from './markers';
import { findAll, lineNumberAt, lookupDayLine, lookupEndOfUnit } from './scan';

describe('buildMarkers', () => {
  it('should prefix every marker with the line ending', () => {
    const markers = buildMarkers('\r\n');
    expect(markers.taskTodo).toBe('\r\n- TODO');
    expect(markers.taskDone).toBe('\r\n- DONE');
    expect(markers.event).toBe('\r\n- EVT');
    expect(markers.day).toBe('\r\n## ');
    expect(markers.unitEnds).toEqual(['\r\n- ', '\r\n\r\n', '\r\n## ', '\r\n# Week ']);
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(buildMarkers('\n'))).toBe(true);
  });
});

describe('detectLineEnding', () => {
  it('should pick CRLF only when the text uses it', () => {
    expect(detectLineEnding('a\r\nb')).toBe('\r\n');
    expect(detectLineEnding('a\nb')).toBe('\n');
    expect(detectLineEnding('')).toBe('\n');
  });
});

describe('lineEndingFromSetting', () => {
  it('should use the configured line ending whatever the text holds', () => {
    expect(lineEndingFromSetting('crlf', 'a\nb')).toBe('\r\n');
    expect(lineEndingFromSetting('lf', 'a\r\nb')).toBe('\n');
  });

  it('should detect the line ending when set to auto', () => {
    expect(lineEndingFromSetting('auto', 'a\r\nb')).toBe('\r\n');
    expect(lineEndingFromSetting('auto', 'a\nb')).toBe('\n');
  });
});

describe('findAll', () => {
  it('should return non-overlapping offsets in order', () => {
    expect(findAll('aXaXa', 'a')).toEqual([0, 2, 4]);
    expect(findAll('aaaa', 'aa')).toEqual([0, 2]);
    expect(findAll('abc', 'z')).toEqual([]);
  });
});

describe('lineNumberAt', () => {
  it('should count lines from one', () => {
    expect(lineNumberAt('a\nb\nc', 0)).toBe(1);
    expect(lineNumberAt('a\nb\nc', 4)).toBe(3);
  });
});

describe('lookupEndOfUnit', () => {
  const { unitEnds } = buildMarkers('\n');

  it('should stop at the closest terminator', () => {
    const text = '- TODO: a\n  - x\n\n## Tue, 15.10.2019\n';
    expect(lookupEndOfUnit(text, 0, unitEnds)).toBe(15);
  });

  it('should throw when no terminator follows', () => {
    expect(() => lookupEndOfUnit('- TODO: a\n  - x', 0, unitEnds)).toThrow(StructuralError);
  });
});

describe('lookupDayLine', () => {
  it('should return the closest heading before the offset', () => {
    const text = '\n## Mon, 14.10.2019\n- a\n## Tue, 15.10.2019\n- b\n';
    expect(lookupDayLine(text, text.indexOf('- b'), '\n## ', '\n')).toBe('## Tue, 15.10.2019');
    expect(lookupDayLine(text, text.indexOf('- a'), '\n## ', '\n')).toBe('## Mon, 14.10.2019');
  });

  it('should throw when there is no heading before the offset', () => {
    expect(() => lookupDayLine('\n- a\n## Mon, 14.10.2019\n', 1, '\n## ', '\n')).toThrow(DateResolutionError);
  });
});
