/**
 * Day One import archive builder
 *
 * Day One's import format is a .zip containing:
 *
 *   Journal.json         entries, each with a "photos" array
 *   photos/<md5>.<type>  attachment files named by their MD5 hash
 *
 * Entry text embeds a photo as ![](dayone-moment://<identifier>), where the
 * identifier matches one of the entry's photo descriptors.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createHash, randomUUID } from 'crypto';
import JSZip from 'jszip';
import { CONSTANTS, TYPE_ALIASES, attachmentPlaceholder } from './constants';
import { LocalFileMissingError } from './errors';
import { DayOneEntry, DayOneExport, JournalEntry, PhotoDescriptor } from './types';

interface PhotoFile {
  md5: string;
  type: string;
}

export type EntryFields = Omit<JournalEntry, 'uuid' | 'photos'>;

/**
 * 32 uppercase hex characters, the identifier form Day One writes
 */
export function generateIdentifier(): string {
  return randomUUID().replace(/-/g, '').toUpperCase();
}

export function createEntry(fields: EntryFields): JournalEntry {
  return {
    uuid: generateIdentifier(),
    creationDate: fields.creationDate,
    modifiedDate: fields.modifiedDate,
    text: fields.text,
    tags: [...fields.tags],
    starred: fields.starred,
    journal: fields.journal,
    photos: [],
    attachmentPaths: [...fields.attachmentPaths],
  };
}

export function md5OfFile(filePath: string): string {
  return createHash('md5').update(fs.readFileSync(filePath)).digest('hex');
}

/**
 * Lowercase extension without the dot, with aliases collapsed (jpg → jpeg)
 */
export function photoType(filePath: string): string {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  if (!ext) {
    return 'bin';
  }
  return TYPE_ALIASES[ext] ?? ext;
}

export function momentReference(identifier: string): string {
  return `${CONSTANTS.MOMENT_URI_SCHEME}${identifier}`;
}

/**
 * Strip the working-only fields from an entry
 */
export function toDayOneEntry(entry: JournalEntry): DayOneEntry {
  return {
    uuid: entry.uuid,
    creationDate: entry.creationDate,
    modifiedDate: entry.modifiedDate,
    text: entry.text,
    tags: [...entry.tags],
    starred: entry.starred,
    journal: entry.journal,
    photos: entry.photos.map(photo => ({ ...photo })),
  };
}

/**
 * Drop a placeholder whose file never made it, together with its image line
 */
function removePlaceholder(text: string, placeholder: string): string {
  for (const candidate of [`![](${placeholder})\n\n`, `![](${placeholder})\n`, `![](${placeholder})`]) {
    if (text.includes(candidate)) {
      return text.replaceAll(candidate, '');
    }
  }
  return text.replaceAll(placeholder, '');
}

export class DayOnePackager {
  // local path → hash and type, so each file is read once per run
  private photoFiles = new Map<string, PhotoFile>();
  // first type seen for a hash, so identical bytes get one member name
  private typesByMd5 = new Map<string, string>();
  private processed = new WeakSet<JournalEntry>();

  /**
   * Resolve every entry's attachment placeholders into photo descriptors and
   * moment references. Entries already processed by this packager are left alone.
   */
  attachPhotos(entries: JournalEntry[]): void {
    for (const entry of entries) {
      if (this.processed.has(entry)) {
        continue;
      }
      this.attachEntryPhotos(entry);
      this.processed.add(entry);
    }
  }

  private attachEntryPhotos(entry: JournalEntry): void {
    const photos: PhotoDescriptor[] = [];
    let text = entry.text;

    entry.attachmentPaths.forEach((localPath, index) => {
      const placeholder = attachmentPlaceholder(index);
      let photoFile: PhotoFile;
      try {
        photoFile = this.lookup(localPath);
      } catch (error) {
        if (!(error instanceof LocalFileMissingError)) {
          throw error;
        }
        console.warn(`  ⚠ ${error.message}, skipping`);
        text = removePlaceholder(text, placeholder);
        return;
      }

      const identifier = generateIdentifier();
      photos.push({
        md5: photoFile.md5,
        identifier,
        type: photoFile.type,
        orderInEntry: photos.length,
      });

      text = text.replaceAll(placeholder, momentReference(identifier));
    });

    entry.text = text;
    entry.photos = photos;
  }

  private lookup(localPath: string): PhotoFile {
    const cached = this.photoFiles.get(localPath);
    if (cached) {
      return cached;
    }

    if (!fs.existsSync(localPath) || !fs.statSync(localPath).isFile()) {
      throw new LocalFileMissingError(localPath);
    }

    const md5 = md5OfFile(localPath);
    const type = this.typesByMd5.get(md5) ?? photoType(localPath);
    this.typesByMd5.set(md5, type);

    const photoFile = { md5, type };
    this.photoFiles.set(localPath, photoFile);
    return photoFile;
  }

  /**
   * Wrap entries in the versioned import envelope
   */
  serialize(entries: JournalEntry[]): DayOneExport {
    return {
      metadata: { version: CONSTANTS.MANIFEST_VERSION },
      entries: entries.map(toDayOneEntry),
    };
  }

  /**
   * Build the zip in memory. Each distinct photo is stored once under
   * photos/<md5>.<type>, however many entries reference it.
   */
  async buildArchive(entries: JournalEntry[]): Promise<Buffer> {
    this.attachPhotos(entries);

    const zip = new JSZip();
    zip.file(CONSTANTS.MANIFEST_FILENAME, JSON.stringify(this.serialize(entries), null, 2));

    const referenced = new Set<string>();
    for (const entry of entries) {
      for (const photo of entry.photos) {
        referenced.add(photo.md5);
      }
    }

    const added = new Set<string>();
    for (const [localPath, { md5, type }] of this.photoFiles) {
      if (!referenced.has(md5) || added.has(md5)) {
        continue;
      }
      zip.file(`${CONSTANTS.PHOTOS_PREFIX}${md5}.${type}`, fs.readFileSync(localPath));
      added.add(md5);
    }

    return zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
    });
  }

  /**
   * Package entries and their attachments into a Day One import zip.
   * Returns the path of the written archive.
   */
  async writeArchive(
    entries: JournalEntry[],
    outputDir: string = CONSTANTS.DEFAULT_OUTPUT_DIR,
    filename: string = CONSTANTS.ARCHIVE_FILENAME
  ): Promise<string> {
    fs.mkdirSync(outputDir, { recursive: true });
    const zipPath = path.join(outputDir, filename);

    const archive = await this.buildArchive(entries);
    fs.writeFileSync(zipPath, archive);

    return zipPath;
  }
}
