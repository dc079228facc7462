export type Birthday =
  | { kind: 'knownYear'; date: string } // YYYY-MM-DD
  | { kind: 'unknownYear'; month: number; day: number };

export interface Person {
  name: string;
  birthday: Birthday;
  presents: string[] | null;
}

export function birthdayMonth(birthday: Birthday): number {
  return birthday.kind === 'knownYear' ? Number(birthday.date.slice(5, 7)) : birthday.month;
}

export function birthdayDay(birthday: Birthday): number {
  return birthday.kind === 'knownYear' ? Number(birthday.date.slice(8, 10)) : birthday.day;
}
