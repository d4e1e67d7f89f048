/**
 * Card → journal entry conversion
 *
 * Mapping:
 *   card name                     → entry title (markdown H1)
 *   card desc                     → entry body paragraph
 *   card due / dateLastActivity   → creationDate
 *   card dateLastActivity         → modifiedDate
 *   list name, then label names   → tags
 *   downloaded attachments        → numbered placeholders, resolved by the packager
 *   other attachments             → "Other Attachments" markdown links
 */

import { attachmentPlaceholder } from './constants';
import { createEntry } from './dayone';
import { Card, JournalEntry } from './types';

const ISO_DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-](\d{2}):(\d{2}))?)?$/;

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Normalize a Trello timestamp to ISO 8601 with an explicit "+00:00" offset.
 * Returns null when the value is missing, not an ISO 8601 string, or names a
 * day or time that does not exist (Feb 30, hour 24).
 */
export function parseTrelloDate(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }

  const match = ISO_DATE_PATTERN.exec(trimmed);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour = '0', minute = '0', second = '0', offset, offsetHour = '0', offsetMinute = '0'] =
    match;
  const monthNumber = Number(month);
  if (monthNumber < 1 || monthNumber > 12) {
    return null;
  }
  const dayNumber = Number(day);
  if (dayNumber < 1 || dayNumber > daysInMonth(Number(year), monthNumber)) {
    return null;
  }
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) {
    return null;
  }
  if (Number(offsetHour) > 23 || Number(offsetMinute) > 59) {
    return null;
  }

  // Date-times without an offset are taken as UTC
  const hasTime = trimmed.includes('T');
  const parsed = new Date(hasTime && !offset ? `${trimmed}Z` : trimmed);
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }

  return formatTimestamp(parsed);
}

/**
 * Break up "{{" in card text so it can never be read as an attachment placeholder.
 * Markdown renders "\{" as a literal brace.
 */
export function escapePlaceholders(text: string): string {
  return text.replace(/\{\{/g, '\\{\\{');
}

export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/Z$/, '+00:00');
}

export class EntryModel {
  /**
   * Build the markdown text for an entry.
   * Downloaded attachments become {{ATTACHMENT_n}} placeholders numbered in card
   * order; the rest are listed as plain links. Braces in card text are escaped
   * so only the generated placeholders remain.
   */
  static buildBody(card: Card, includeAttachments: boolean = true): string {
    const lines: string[] = [];

    lines.push(`# ${escapePlaceholders(card.name ?? '')}`);
    lines.push('');

    const description = (card.desc ?? '').trim();
    if (description) {
      lines.push(escapePlaceholders(description));
      lines.push('');
    }

    const attachments = card.attachments ?? [];
    if (includeAttachments && attachments.length > 0) {
      const downloaded = attachments.filter(a => a.localPath);
      const notDownloaded = attachments.filter(a => !a.localPath && a.url);

      downloaded.forEach((_attachment, index) => {
        lines.push(`![](${attachmentPlaceholder(index)})`);
        lines.push('');
      });

      if (notDownloaded.length > 0) {
        lines.push('## Other Attachments');
        lines.push('');
        for (const attachment of notDownloaded) {
          lines.push(`- [${escapePlaceholders(attachment.name || attachment.url || '')}](${attachment.url})`);
        }
        lines.push('');
      }
    }

    return lines.join('\n');
  }

  /**
   * List name first, then label names in card order. Duplicates are kept.
   */
  static collectTags(card: Card): string[] {
    const tags: string[] = [];

    if (card.listName) {
      tags.push(card.listName);
    }

    for (const label of card.labels ?? []) {
      if (label.name) {
        tags.push(label.name);
      }
    }

    return tags;
  }

  /**
   * creationDate prefers the due date, then last activity, then now.
   * modifiedDate is last activity, or now.
   */
  static resolveDates(card: Card, now: Date = new Date()): { creationDate: string; modifiedDate: string } {
    const fallback = formatTimestamp(now);
    const lastActivity = parseTrelloDate(card.dateLastActivity);

    return {
      creationDate: parseTrelloDate(card.due) ?? lastActivity ?? fallback,
      modifiedDate: lastActivity ?? fallback,
    };
  }

  /**
   * Convert one card to a working entry. `attachmentPaths` lists the local files
   * of downloaded attachments in the same order as the placeholders.
   */
  static fromCard(card: Card, journalName: string, includeAttachments: boolean = true): JournalEntry {
    const { creationDate, modifiedDate } = EntryModel.resolveDates(card);

    const attachmentPaths: string[] = [];
    if (includeAttachments) {
      for (const attachment of card.attachments ?? []) {
        if (attachment.localPath) {
          attachmentPaths.push(attachment.localPath);
        }
      }
    }

    return createEntry({
      text: EntryModel.buildBody(card, includeAttachments),
      creationDate,
      modifiedDate,
      tags: EntryModel.collectTags(card),
      starred: false,
      journal: journalName,
      attachmentPaths,
    });
  }
}

/**
 * Keep only cards whose list name is in the filter (case-insensitive).
 * An empty or missing filter keeps every card.
 */
export function filterCardsByList(cards: Card[], listFilter?: readonly string[]): Card[] {
  if (!listFilter || listFilter.length === 0) {
    return cards;
  }

  const allowedLists = new Set(listFilter.map(name => name.toLowerCase()));
  return cards.filter(card => allowedLists.has((card.listName ?? '').toLowerCase()));
}

export function transformCards(
  cards: Card[],
  listFilter: readonly string[] | undefined,
  journalName: string,
  includeAttachments: boolean = true
): JournalEntry[] {
  return filterCardsByList(cards, listFilter).map(card =>
    EntryModel.fromCard(card, journalName, includeAttachments)
  );
}
