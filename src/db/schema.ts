import { Kysely } from 'kysely';
import type { Generated } from 'kysely';

export interface Database {
  items: ItemTable;
  transactions: TransactionTable;
  oauth: OAuthTable;
}

export type MediaKind = 'Photo' | 'Video';
export type DownloadStatus = 'Pending' | 'Downloaded';
export type TransactionKind = 'Added' | 'Downloaded';

export interface ItemTable {
  id: string;
  creation_time: number; // epoch milliseconds
  path: string;
  filename: string;
  mime_type: string;
  media_kind: MediaKind;
  download_status: DownloadStatus;
}

export interface TransactionTable {
  id: Generated<number>;
  item_id: string;
  event_kind: TransactionKind;
  timestamp: number; // epoch milliseconds
}

export interface OAuthTable {
  id: string;
  credentials: Buffer;
}

export async function createSchema(db: Kysely<Database>): Promise<void> {
  // Create items table
  await db.schema
    .createTable('items')
    .ifNotExists()
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('creation_time', 'integer', (col) => col.notNull())
    .addColumn('path', 'text', (col) => col.notNull())
    .addColumn('filename', 'text', (col) => col.notNull())
    .addColumn('mime_type', 'text', (col) => col.notNull())
    .addColumn('media_kind', 'text', (col) => col.notNull())
    .addColumn('download_status', 'text', (col) => col.defaultTo('Pending').notNull())
    .execute();

  // Create transactions table (append-only audit log)
  await db.schema
    .createTable('transactions')
    .ifNotExists()
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('item_id', 'text', (col) => col.notNull())
    .addColumn('event_kind', 'text', (col) => col.notNull())
    .addColumn('timestamp', 'integer', (col) => col.notNull())
    .execute();

  // Create oauth table
  await db.schema
    .createTable('oauth')
    .ifNotExists()
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('credentials', 'blob', (col) => col.notNull())
    .execute();

  // Create indexes
  await db.schema
    .createIndex('idx_items_status_creation_time')
    .ifNotExists()
    .on('items')
    .columns(['download_status', 'creation_time', 'id'])
    .execute();

  await db.schema
    .createIndex('idx_items_creation_time')
    .ifNotExists()
    .on('items')
    .column('creation_time')
    .execute();

  await db.schema
    .createIndex('idx_transactions_item_id')
    .ifNotExists()
    .on('transactions')
    .column('item_id')
    .execute();
}
