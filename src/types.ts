/**
 * Type definitions for the migration
 */

export interface TrelloBoard {
  id?: string;
  name: string;
  desc?: string;
  url?: string;
}

export interface TrelloList {
  id: string;
  name: string;
  closed?: boolean;
}

export interface TrelloLabel {
  id?: string;
  name?: string;
  color?: string | null;
}

export interface TrelloAttachment {
  id?: string;
  name?: string;
  url?: string;
  mimeType?: string | null;
  date?: string;
}

/**
 * Card as returned by GET /lists/{id}/cards with the fields we request
 */
export interface TrelloCard {
  id: string;
  name?: string;
  desc?: string;
  due?: string | null;
  dateLastActivity?: string;
  closed?: boolean;
  labels?: TrelloLabel[];
  attachments?: TrelloAttachment[];
}

/**
 * Attachment after the download step. `localPath` is only set when the
 * bytes were saved successfully.
 */
export interface Attachment extends TrelloAttachment {
  localPath?: string;
}

/**
 * Card annotated with the list it was fetched from.
 *
 * Every field except `id` is optional; the transformer defaults them:
 * missing name → empty title, missing desc → no paragraph, missing labels or
 * attachments → none, missing/unparsable dates → now.
 */
export interface Card extends Omit<TrelloCard, 'attachments'> {
  listId?: string;
  listName?: string;
  attachments?: Attachment[];
}

export interface PhotoDescriptor {
  md5: string;
  identifier: string;
  type: string;
  orderInEntry: number;
}

/**
 * Entry as it appears in Journal.json
 */
export interface DayOneEntry {
  uuid: string;
  creationDate: string;
  modifiedDate: string;
  text: string;
  tags: string[];
  starred: boolean;
  journal: string;
  photos: PhotoDescriptor[];
}

/**
 * Working entry used between the transformer and the packager.
 * `attachmentPaths` holds local files in placeholder order and never reaches
 * the manifest.
 */
export interface JournalEntry extends DayOneEntry {
  attachmentPaths: string[];
}

export interface DayOneExport {
  metadata: {
    version: string;
  };
  entries: DayOneEntry[];
}

export interface BoardData {
  lists: TrelloList[];
  cards: Card[];
}

export interface MigrationResult {
  entryCount: number;
  attachmentCount: number;
  archivePath?: string;
}
