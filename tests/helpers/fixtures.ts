import { vi } from 'vitest';
import { Book, Dvd, Magazine } from '../../src/models/item.model';
import { Member, Staff } from '../../src/models/user.model';
import { addDays } from '../../src/utils/dates';

export const START = new Date('2025-03-01T09:00:00.000Z');

/**
 * Freeze the clock at `START`; only Date is faked so supertest keeps working
 */
export const freezeClock = (at: Date = START): void => {
  vi.useFakeTimers({ toFake: ['Date'] });
  vi.setSystemTime(at);
};

export const advanceDays = (days: number): void => {
  vi.setSystemTime(addDays(new Date(), days));
};

/**
 * Sequential loan ids: loan-1, loan-2, ...
 */
export const sequentialIds = (prefix = 'loan'): (() => string) => {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
};

export const aBook = (id = 'B1', title = 'The Silent River'): Book =>
  Book.create({ id, title, author: 'Ada Fenwick', isbn: '978-0000000001', pages: 320 });

export const aMagazine = (id = 'M1', title = 'Garden Monthly'): Magazine =>
  Magazine.create({ id, title, issueNumber: '42', publisher: 'Leaf Press' });

export const aDvd = (id = 'D1', title = 'Harbor Lights'): Dvd =>
  Dvd.create({ id, title, durationMinutes: 135, genre: 'Drama', director: 'J. Moreau', rating: 'PG-13' });

export const aMember = (id = 'U1', name = 'Alice Reader'): Member =>
  Member.create({ id, name, email: `${id.toLowerCase()}@example.com`, phone: '555-0100' });

export const aStaff = (id = 'S1', staffRole: 'Manager' | 'Librarian' = 'Librarian'): Staff =>
  Staff.create({ id, name: 'Sam Shelver', email: `${id.toLowerCase()}@example.com`, staffRole });
