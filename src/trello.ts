/**
 * Trello integration module
 */

import axios, { AxiosInstance } from 'axios';
import * as fs from 'fs';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import { Readable } from 'stream';
import { CONSTANTS } from './constants';
import { AuthError, DownloadError, NetworkError, NotFoundError } from './errors';
import { BoardData, Card, TrelloBoard, TrelloCard, TrelloList } from './types';

const CARD_FIELDS = 'name,desc,dateLastActivity,due,labels,closed';
const ATTACHMENT_FIELDS = 'name,url,mimeType,date';

export interface TrelloClientOptions {
  metadataTimeoutMs?: number;
  downloadTimeoutMs?: number;
}

export class TrelloIntegration {
  private client: AxiosInstance;
  private authParams: { key: string; token: string };
  private downloadTimeoutMs: number;

  constructor(
    apiKey: string,
    apiToken: string,
    apiBaseUrl: string = CONSTANTS.TRELLO_API_BASE_URL,
    options: TrelloClientOptions = {}
  ) {
    if (!apiKey || !apiToken) {
      throw new AuthError('Trello API key and token are required');
    }

    this.authParams = { key: apiKey, token: apiToken };
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? CONSTANTS.DOWNLOAD_TIMEOUT_MS;
    this.client = axios.create({
      baseURL: apiBaseUrl.replace(/\/$/, ''),
      timeout: options.metadataTimeoutMs ?? CONSTANTS.METADATA_TIMEOUT_MS,
      headers: {
        'Accept': 'application/json',
      },
    });
  }

  /**
   * Authenticated GET against the API; failures are mapped onto the error taxonomy
   */
  private async get<T>(urlPath: string, params: Record<string, string> = {}): Promise<T> {
    try {
      const response = await this.client.get<T>(urlPath, {
        params: { ...params, ...this.authParams },
      });
      return response.data;
    } catch (error) {
      throw classifyRequestError(urlPath, error);
    }
  }

  /**
   * Fetch board metadata (name, description, url)
   */
  async getBoard(boardId: string): Promise<TrelloBoard> {
    return this.get<TrelloBoard>(`/boards/${encodeURIComponent(boardId)}`, { fields: 'name,desc,url' });
  }

  /**
   * Fetch all lists on a board. Archived lists come back only when requested.
   */
  async getLists(boardId: string, includeArchived: boolean = false): Promise<TrelloList[]> {
    return this.get<TrelloList[]>(`/boards/${encodeURIComponent(boardId)}/lists`, {
      filter: includeArchived ? 'all' : 'open',
    });
  }

  /**
   * Fetch all cards in a list, with their labels and attachments
   */
  async getCards(listId: string, includeArchived: boolean = false): Promise<TrelloCard[]> {
    return this.get<TrelloCard[]>(`/lists/${encodeURIComponent(listId)}/cards`, {
      filter: includeArchived ? 'all' : 'open',
      fields: CARD_FIELDS,
      attachments: 'true',
      attachment_fields: ATTACHMENT_FIELDS,
    });
  }

  /**
   * Fetch every card across every list on a board.
   * Cards are returned in list order, each annotated with its list's id and name.
   */
  async getAllCardsOnBoard(boardId: string, includeArchived: boolean = false): Promise<BoardData> {
    const startTime = Date.now();
    const lists = await this.getLists(boardId, includeArchived);
    const cards: Card[] = [];

    for (const list of lists) {
      const listCards = await this.getCards(list.id, includeArchived);
      console.log(`  ${list.name}: ${listCards.length} cards`);

      for (const card of listCards) {
        cards.push({ ...card, listId: list.id, listName: list.name });
      }
    }

    const elapsed = Date.now() - startTime;
    console.log(`  ✓ Fetched ${cards.length} cards from ${lists.length} lists (${(elapsed / 1000).toFixed(2)}s)`);
    return { lists, cards };
  }

  /**
   * Stream an attachment to disk, creating parent directories as needed.
   * Attachment URLs on private boards need the same key/token as the API.
   * The response body is released on every failure path so its socket closes.
   */
  async downloadAttachment(url: string, saveTo: string): Promise<string> {
    let body: Readable | undefined;
    try {
      fs.mkdirSync(path.dirname(saveTo), { recursive: true });

      const response = await this.client.get<Readable>(url, {
        params: this.authParams,
        responseType: 'stream',
        timeout: this.downloadTimeoutMs,
        headers: { Accept: '*/*' },
      });
      body = response.data;

      await pipeline(body, fs.createWriteStream(saveTo));
      return saveTo;
    } catch (error) {
      body?.destroy();
      discardErrorBody(error);
      if (fs.existsSync(saveTo)) {
        fs.rmSync(saveTo, { force: true });
      }
      throw new DownloadError(url, error);
    }
  }
}

// A non-2xx streamed response still carries an unread body
function discardErrorBody(error: unknown): void {
  if (!axios.isAxiosError(error)) {
    return;
  }
  const data: unknown = error.response?.data;
  if (data instanceof Readable) {
    data.destroy();
  }
}

/**
 * Map an axios failure to AuthError / NotFoundError / NetworkError
 */
export function classifyRequestError(urlPath: string, error: unknown): Error {
  if (!axios.isAxiosError(error)) {
    return new NetworkError(`Request to ${urlPath} failed: ${String(error)}`, error);
  }

  const status = error.response?.status;
  const data: unknown = error.response?.data;
  const body = typeof data === 'string' ? data.trim() : '';
  const detail = body ? `${status}: ${body}` : `${status}`;

  if (status === 401 || status === 403) {
    return new AuthError(`Trello rejected the credentials for ${urlPath} (${detail})`, error);
  }
  if (status === 404 || (status === 400 && /invalid id/i.test(body))) {
    return new NotFoundError(`Not found: ${urlPath} (${detail})`, error);
  }
  if (status !== undefined) {
    return new NetworkError(`Request to ${urlPath} failed with status ${detail}`, error);
  }
  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return new NetworkError(`Request to ${urlPath} timed out`, error);
  }
  return new NetworkError(`Request to ${urlPath} failed: ${error.message}`, error);
}
