import { ConfigError, loadConfig, validateConfig } from './configLoader';
import { LogLevel } from './logger';

jest.mock('./logger');

const raw = {
  appName: 'mdlog',
  logging: { consoleLogLevel: 'INFO', fileLogLevel: 'WARN', logFile: null },
  parser: { lineEnding: 'auto', invalidDates: 'fail' },
  generator: { birthdayFile: 'birthdays.yml', callProbability: 0.1, placeholderTodo: false },
};

describe('validateConfig', () => {
  it('should accept a complete configuration', () => {
    expect(validateConfig(raw)).toEqual(raw);
  });

  it('should convert values that come from environment variables', () => {
    const config = validateConfig({
      ...raw,
      generator: { birthdayFile: 'people.yml', callProbability: '0.25', placeholderTodo: 'true' },
    });
    expect(config.generator).toEqual({ birthdayFile: 'people.yml', callProbability: 0.25, placeholderTodo: true });
  });

  it('should name the offending key', () => {
    expect(() => validateConfig({ ...raw, parser: { lineEnding: 'cr', invalidDates: 'fail' } })).toThrow(ConfigError);
    expect(() => validateConfig({ ...raw, parser: { lineEnding: 'cr', invalidDates: 'fail' } })).toThrow('parser.lineEnding');
  });
});

describe('loadConfig', () => {
  it('should merge the test configuration over the defaults', () => {
    const config = loadConfig();
    expect(config.logging.consoleLogLevel).toBe(LogLevel.ERROR);
    expect(config.parser).toEqual({ lineEnding: 'auto', invalidDates: 'fail' });
    expect(config.generator.birthdayFile).toBe('birthdays.yml');
  });
});
