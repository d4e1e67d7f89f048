/**
 * Migration engine: Trello → entries → Day One archive
 */

import * as path from 'path';
import { Config } from './config';
import { CONSTANTS, MIME_EXTENSIONS } from './constants';
import { DayOnePackager, toDayOneEntry } from './dayone';
import { describeError } from './errors';
import { filterCardsByList, transformCards } from './models';
import { TrelloIntegration } from './trello';
import { Attachment, Card, JournalEntry, MigrationResult } from './types';

export type AttachmentDownloader = Pick<TrelloIntegration, 'downloadAttachment'>;
export type BoardSource = Pick<TrelloIntegration, 'getBoard' | 'getAllCardsOnBoard' | 'downloadAttachment'>;

export interface RunOptions {
  dryRun: boolean;
  outputDir: string;
}

const INVALID_FILENAME_CHARS = /[/\\:*?"<>|\x00-\x1f]/g;

function urlBasename(url: string): string {
  try {
    return decodeURIComponent(path.posix.basename(new URL(url).pathname));
  } catch {
    return path.posix.basename(url.split('?')[0]);
  }
}

/**
 * Pick a safe, card-unique file name for an attachment.
 * `usedNames` holds lowercase names already taken on this card and is updated.
 */
export function attachmentFilename(attachment: Attachment, usedNames: Set<string>): string {
  let name = (attachment.name || urlBasename(attachment.url ?? '')).replace(INVALID_FILENAME_CHARS, '_').trim();
  if (!name || name === '.' || name === '..') {
    name = 'attachment';
  }

  const mimeExtension = attachment.mimeType ? MIME_EXTENSIONS[attachment.mimeType] : undefined;
  if (!path.extname(name) && mimeExtension) {
    name = `${name}.${mimeExtension}`;
  }

  const ext = path.extname(name);
  const stem = name.slice(0, name.length - ext.length);
  let candidate = name;
  for (let n = 2; usedNames.has(candidate.toLowerCase()); n++) {
    candidate = `${stem}-${n}${ext}`;
  }

  usedNames.add(candidate.toLowerCase());
  return candidate;
}

/**
 * Download every attachment into <downloadDir>/<cardId>/.
 * Successful downloads set `localPath` on the attachment; failures are logged
 * and leave it unset. Returns the number of files downloaded.
 */
export async function downloadAttachments(
  client: AttachmentDownloader,
  cards: Card[],
  downloadDir: string
): Promise<number> {
  let totalDownloaded = 0;

  for (const card of cards) {
    const attachments = card.attachments ?? [];
    if (attachments.length === 0) {
      continue;
    }

    const cardFolder = path.join(downloadDir, card.id);
    const usedNames = new Set<string>();

    for (const attachment of attachments) {
      if (!attachment.url) {
        continue;
      }

      const filename = attachmentFilename(attachment, usedNames);
      try {
        attachment.localPath = await client.downloadAttachment(attachment.url, path.join(cardFolder, filename));
        totalDownloaded++;
        console.log(`  ✓ Downloaded: ${filename}`);
      } catch (error) {
        console.warn(`  ⚠ Failed to download ${filename}: ${describeError(error)}`);
      }
    }
  }

  return totalDownloaded;
}

/**
 * Attachments that would be embedded or linked for these cards
 */
export function countAttachments(cards: Card[]): number {
  return cards.reduce((total, card) => total + (card.attachments ?? []).filter(a => a.url).length, 0);
}

export class MigrationEngine {
  constructor(
    private trello: BoardSource,
    private packager: DayOnePackager,
    private config: Config
  ) {}

  /**
   * Run the whole migration once. A dry run fetches and transforms but writes nothing.
   */
  async run(options: RunOptions): Promise<MigrationResult> {
    const { boardId } = this.config.trello;
    const { includeArchived, includeAttachments, listFilter } = this.config.options;
    const startTime = Date.now();

    console.log(`\n[Step 1/4] Connecting to Trello board: ${boardId}`);
    const board = await this.trello.getBoard(boardId);
    console.log(`  Board: "${board.name}"`);

    console.log('\n[Step 2/4] Fetching lists and cards...');
    const { lists, cards } = await this.trello.getAllCardsOnBoard(boardId, includeArchived);
    const selectedCards = filterCardsByList(cards, listFilter);
    console.log(`  Found ${lists.length} lists, ${cards.length} cards (${selectedCards.length} selected)`);

    console.log('\n[Step 3/4] Downloading attachments...');
    if (!includeAttachments) {
      console.log('  Skipped: attachments disabled');
    } else if (options.dryRun) {
      console.log('  Skipped: dry run');
    } else {
      const downloadDir = path.join(options.outputDir, CONSTANTS.ATTACHMENTS_DIRNAME);
      console.log(`  Saving to: ${downloadDir}`);
      const downloaded = await downloadAttachments(this.trello, selectedCards, downloadDir);
      console.log(`  ✓ Downloaded ${downloaded} attachment(s)`);
    }

    console.log('\n[Step 4/4] Building Day One entries...');
    const entries = transformCards(selectedCards, undefined, this.config.dayone.journalName, includeAttachments);
    console.log(`  ✓ Transformed ${entries.length} entries`);

    if (options.dryRun) {
      const attachmentCount = includeAttachments ? countAttachments(selectedCards) : 0;
      this.printDryRunSummary(entries, attachmentCount);
      return { entryCount: entries.length, attachmentCount };
    }

    const archivePath = await this.packager.writeArchive(entries, options.outputDir);
    const attachmentCount = entries.reduce((total, entry) => total + entry.photos.length, 0);

    const elapsed = Date.now() - startTime;
    console.log(`  ✓ Packaged ${entries.length} entries with ${attachmentCount} photo(s) (${(elapsed / 1000).toFixed(2)}s)`);

    return { entryCount: entries.length, attachmentCount, archivePath };
  }

  private printDryRunSummary(entries: JournalEntry[], attachmentCount: number): void {
    console.log('\n--- DRY RUN ---');
    console.log(`Would create ${entries.length} Day One entries.`);
    console.log(`Total attachments: ${attachmentCount}`);

    const sample = entries[0];
    if (sample) {
      console.log('\nSample entry:');
      console.log(JSON.stringify(toDayOneEntry(sample), null, 2));
    }
  }
}
