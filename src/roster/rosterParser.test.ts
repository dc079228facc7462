import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { groupByBirthday, loadRosterFile, parseBirthday, parsePeople, RosterFormatError } from './rosterParser';
import type { Person } from '../types/person';

const ROSTER = `
Alex: 19.01.2001
Bob Smith: 20.12.?
John Johnson: 21.12.1947

### Presents
Alex:
- Salad
- Moar Salad

Bob Smith:
- Bazooka
`;

const EXPECTED: Person[] = [
  { name: 'Alex', birthday: { kind: 'knownYear', date: '2001-01-19' }, presents: ['Salad', 'Moar Salad'] },
  { name: 'Bob Smith', birthday: { kind: 'unknownYear', month: 12, day: 20 }, presents: ['Bazooka'] },
  { name: 'John Johnson', birthday: { kind: 'knownYear', date: '1947-12-21' }, presents: null },
];

describe('parsePeople', () => {
  it('should read birthdays and attach presents by name', () => {
    expect(parsePeople(ROSTER)).toEqual(EXPECTED);
  });

  it('should work without a presents section', () => {
    expect(parsePeople('Alex: 19.01.2001\n')).toEqual([
      { name: 'Alex', birthday: { kind: 'knownYear', date: '2001-01-19' }, presents: null },
    ]);
  });

  it('should not take presents from built-in object members', () => {
    expect(parsePeople('toString: 19.01.2001\nconstructor: 20.12.?\n\n# Presents\nAlex:\n- Salad\n')).toEqual([
      { name: 'toString', birthday: { kind: 'knownYear', date: '2001-01-19' }, presents: null },
      { name: 'constructor', birthday: { kind: 'unknownYear', month: 12, day: 20 }, presents: null },
    ]);
  });

  it('should return nobody for an empty file', () => {
    expect(parsePeople('')).toEqual([]);
  });

  it('should reject malformed YAML', () => {
    expect(() => parsePeople('Alex: [19.01.2001\n')).toThrow(RosterFormatError);
  });

  it('should reject a list where a mapping is expected', () => {
    expect(() => parsePeople('- Alex\n- Bob\n')).toThrow(RosterFormatError);
  });
});

describe('parseBirthday', () => {
  it('should accept 29.02.? for unknown years', () => {
    expect(parseBirthday('Leap', '29.02.?')).toEqual({ kind: 'unknownYear', month: 2, day: 29 });
  });

  it('should reject dates that do not exist', () => {
    expect(() => parseBirthday('Alex', '31.02.2001')).toThrow("Failed to parse the birthday of Alex: '31.02.2001'");
  });
});

describe('groupByBirthday', () => {
  it('should key people by month and day', () => {
    const grouped = groupByBirthday(EXPECTED);
    expect([...grouped.keys()]).toEqual(['01-19', '12-20', '12-21']);
    expect(grouped.get('12-20')?.map((p) => p.name)).toEqual(['Bob Smith']);
  });
});

describe('loadRosterFile', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mdlog-roster-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should parse the file content', async () => {
    const file = path.join(tmpDir, 'birthdays.yml');
    await fs.writeFile(file, ROSTER, 'utf-8');
    await expect(loadRosterFile(file)).resolves.toEqual(EXPECTED);
  });

  it('should pass on a missing file error', async () => {
    await expect(loadRosterFile(path.join(tmpDir, 'missing.yml'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
