import { z } from 'zod';
import {
  BookSnapshot,
  DVD_RATINGS,
  DvdSnapshot,
  ItemKind,
  ItemSnapshot,
  LOAN_PERIOD_DAYS,
  MagazineSnapshot,
} from '../types/item.types';
import { identifier, optionalText, parseEntityInput, requiredText } from './validation';

/**
 * Item validation schemas
 */

const itemBaseSchema = z.object({
  id: identifier('Item ID'),
  title: requiredText('Title').max(500, 'Title must be at most 500 characters'),
});

export const bookInputSchema = itemBaseSchema.extend({
  kind: z.literal('Book'),
  author: requiredText('Author'),
  isbn: requiredText('ISBN'),
  pages: z.number().int('Pages must be an integer').nonnegative('Pages cannot be negative').default(0),
});

export const magazineInputSchema = itemBaseSchema.extend({
  kind: z.literal('Magazine'),
  issueNumber: requiredText('Issue number'),
  publisher: requiredText('Publisher'),
  publicationDate: z.coerce.date().optional(),
});

export const dvdInputSchema = itemBaseSchema.extend({
  kind: z.literal('DVD'),
  durationMinutes: z.number().int('Duration must be an integer').positive('Duration must be positive'),
  genre: requiredText('Genre'),
  director: optionalText(),
  rating: z.enum(DVD_RATINGS).nullish().transform((val) => val ?? null),
});

export const newItemInputSchema = z.discriminatedUnion('kind', [
  bookInputSchema,
  magazineInputSchema,
  dvdInputSchema,
]);

export type BookInput = z.input<typeof bookInputSchema>;
export type MagazineInput = z.input<typeof magazineInputSchema>;
export type DvdInput = z.input<typeof dvdInputSchema>;
export type NewItemInput = z.input<typeof newItemInputSchema>;

const titleSchema = itemBaseSchema.shape.title;

interface ItemState {
  id: string;
  title: string;
  isAvailable: boolean;
  dateAdded: Date;
}

/**
 * Shared state and availability guards for every catalog item kind
 */
export abstract class CatalogItem<K extends ItemKind> {
  abstract readonly kind: K;

  readonly id: string;
  readonly dateAdded: Date;
  private _title: string;
  private _isAvailable: boolean;

  protected constructor(state: ItemState) {
    this.id = state.id;
    this._title = state.title;
    this._isAvailable = state.isAvailable;
    this.dateAdded = new Date(state.dateAdded);
  }

  get title(): string {
    return this._title;
  }

  isAvailable(): boolean {
    return this._isAvailable;
  }

  itemType(): K {
    return this.kind;
  }

  loanPeriodDays(): number {
    return LOAN_PERIOD_DAYS[this.kind];
  }

  rename(title: string): void {
    this._title = parseEntityInput(titleSchema, title, 'title');
  }

  /**
   * @returns false if the item is already out
   */
  markCheckedOut(): boolean {
    if (!this._isAvailable) return false;
    this._isAvailable = false;
    return true;
  }

  /**
   * @returns false if the item is already on the shelf
   */
  markCheckedIn(): boolean {
    if (this._isAvailable) return false;
    this._isAvailable = true;
    return true;
  }

  protected baseSnapshot(): ItemState {
    return {
      id: this.id,
      title: this._title,
      isAvailable: this._isAvailable,
      dateAdded: new Date(this.dateAdded),
    };
  }

  abstract toSnapshot(): ItemSnapshot;
}

export class Book extends CatalogItem<'Book'> {
  readonly kind = 'Book' as const;
  readonly author: string;
  readonly isbn: string;
  readonly pages: number;

  constructor(snapshot: Omit<BookSnapshot, 'kind'>) {
    super(snapshot);
    this.author = snapshot.author;
    this.isbn = snapshot.isbn;
    this.pages = snapshot.pages;
  }

  static create(input: Omit<BookInput, 'kind'>): Book {
    const data = parseEntityInput(bookInputSchema, { ...input, kind: 'Book' }, 'book');
    return new Book({ ...data, isAvailable: true, dateAdded: new Date() });
  }

  toSnapshot(): BookSnapshot {
    return { ...this.baseSnapshot(), kind: this.kind, author: this.author, isbn: this.isbn, pages: this.pages };
  }
}

export class Magazine extends CatalogItem<'Magazine'> {
  readonly kind = 'Magazine' as const;
  readonly issueNumber: string;
  readonly publisher: string;
  readonly publicationDate: Date;

  constructor(snapshot: Omit<MagazineSnapshot, 'kind'>) {
    super(snapshot);
    this.issueNumber = snapshot.issueNumber;
    this.publisher = snapshot.publisher;
    this.publicationDate = new Date(snapshot.publicationDate);
  }

  static create(input: Omit<MagazineInput, 'kind'>): Magazine {
    const data = parseEntityInput(magazineInputSchema, { ...input, kind: 'Magazine' }, 'magazine');
    const now = new Date();
    return new Magazine({
      ...data,
      publicationDate: data.publicationDate ?? now,
      isAvailable: true,
      dateAdded: now,
    });
  }

  toSnapshot(): MagazineSnapshot {
    return {
      ...this.baseSnapshot(),
      kind: this.kind,
      issueNumber: this.issueNumber,
      publisher: this.publisher,
      publicationDate: new Date(this.publicationDate),
    };
  }
}

export class Dvd extends CatalogItem<'DVD'> {
  readonly kind = 'DVD' as const;
  readonly durationMinutes: number;
  readonly genre: string;
  readonly director: string | null;
  readonly rating: DvdSnapshot['rating'];

  constructor(snapshot: Omit<DvdSnapshot, 'kind'>) {
    super(snapshot);
    this.durationMinutes = snapshot.durationMinutes;
    this.genre = snapshot.genre;
    this.director = snapshot.director;
    this.rating = snapshot.rating;
  }

  static create(input: Omit<DvdInput, 'kind'>): Dvd {
    const data = parseEntityInput(dvdInputSchema, { ...input, kind: 'DVD' }, 'DVD');
    return new Dvd({ ...data, isAvailable: true, dateAdded: new Date() });
  }

  // e.g. "2h 15m"
  formattedDuration(): string {
    const hours = Math.floor(this.durationMinutes / 60);
    const minutes = this.durationMinutes % 60;
    return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
  }

  toSnapshot(): DvdSnapshot {
    return {
      ...this.baseSnapshot(),
      kind: this.kind,
      durationMinutes: this.durationMinutes,
      genre: this.genre,
      director: this.director,
      rating: this.rating,
    };
  }
}

export type Item = Book | Magazine | Dvd;

/**
 * Build a new, available item of the requested kind from untrusted input
 */
export function createItem(input: NewItemInput): Item {
  const data = parseEntityInput(newItemInputSchema, input, 'item');
  const now = new Date();

  switch (data.kind) {
    case 'Book':
      return new Book({ ...data, isAvailable: true, dateAdded: now });
    case 'Magazine':
      return new Magazine({
        ...data,
        publicationDate: data.publicationDate ?? now,
        isAvailable: true,
        dateAdded: now,
      });
    case 'DVD':
      return new Dvd({ ...data, isAvailable: true, dateAdded: now });
  }
}

export function restoreItem(snapshot: ItemSnapshot): Item {
  switch (snapshot.kind) {
    case 'Book':
      return new Book(snapshot);
    case 'Magazine':
      return new Magazine(snapshot);
    case 'DVD':
      return new Dvd(snapshot);
  }
}
