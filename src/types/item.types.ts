/**
 * Item domain types
 */

export const ITEM_KINDS = ['Book', 'Magazine', 'DVD'] as const;
export type ItemKind = (typeof ITEM_KINDS)[number];

// Loan period is fixed per item kind
export const LOAN_PERIOD_DAYS: Readonly<Record<ItemKind, number>> = {
  Book: 21,
  Magazine: 7,
  DVD: 14,
};

export const DVD_RATINGS = ['G', 'PG', 'PG-13', 'R', 'NC-17', 'NR'] as const;
export type DvdRating = (typeof DVD_RATINGS)[number];

interface ItemSnapshotBase {
  id: string;
  title: string;
  isAvailable: boolean;
  dateAdded: Date;
}

export interface BookSnapshot extends ItemSnapshotBase {
  kind: 'Book';
  author: string;
  isbn: string;
  pages: number;
}

export interface MagazineSnapshot extends ItemSnapshotBase {
  kind: 'Magazine';
  issueNumber: string;
  publisher: string;
  publicationDate: Date;
}

export interface DvdSnapshot extends ItemSnapshotBase {
  kind: 'DVD';
  durationMinutes: number;
  genre: string;
  director: string | null;
  rating: DvdRating | null;
}

export type ItemSnapshot = BookSnapshot | MagazineSnapshot | DvdSnapshot;

// Database row type (snake_case from PostgreSQL)
export interface ItemRow {
  item_id: string;
  title: string;
  item_type: string;
  is_available: boolean;
  date_added: string;
  // Book
  author: string | null;
  isbn: string | null;
  pages: number | null;
  // Magazine
  issue_number: string | null;
  publisher: string | null;
  publication_date: string | null;
  // DVD
  duration: number | null;
  genre: string | null;
  director: string | null;
  rating: string | null;
}

export interface ItemFilter {
  kind?: ItemKind;
  available?: boolean;
  query?: string;
}

export interface PopularItem<TItem> {
  item: TItem;
  loanCount: number;
}
