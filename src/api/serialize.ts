import type { Item, ItemMetadata, TransactionLogEntry } from '../../services/photosync/src/sync/types.js';

export function serializeItem(item: Item) {
  return {
    id: item.id,
    creation_time: item.creationTime.toISOString(),
    path: item.path,
    filename: item.filename,
    mime_type: item.mimeType,
    media_kind: item.mediaKind,
    download_status: item.status,
  };
}

export function serializeTransaction(entry: TransactionLogEntry) {
  return {
    item_id: entry.itemId,
    event_kind: entry.eventKind,
    timestamp: entry.timestamp.toISOString(),
  };
}

export function serializeMetadata(metadata: ItemMetadata) {
  return {
    id: metadata.id,
    creation_time: metadata.creationTime,
    filename: metadata.filename,
    mime_type: metadata.mimeType,
    media_kind: metadata.mediaKind,
  };
}
