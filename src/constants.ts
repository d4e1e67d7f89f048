/**
 * Application constants and configuration
 */

export const CONSTANTS = {
  /**
   * Trello REST API root
   */
  TRELLO_API_BASE_URL: 'https://api.trello.com/1',

  /**
   * Timeout for board/list/card metadata requests in milliseconds
   */
  METADATA_TIMEOUT_MS: 30_000,

  /**
   * Timeout for attachment downloads in milliseconds
   */
  DOWNLOAD_TIMEOUT_MS: 60_000,

  /**
   * Numbered marker written into entry text for each downloaded attachment.
   * Replaced with a moment reference once the packager assigns identifiers.
   */
  ATTACHMENT_PLACEHOLDER: '{{ATTACHMENT_%d}}',

  /**
   * URI scheme Day One uses to embed a photo in entry markdown
   */
  MOMENT_URI_SCHEME: 'dayone-moment://',

  /**
   * Import archive layout
   */
  MANIFEST_FILENAME: 'Journal.json',
  ARCHIVE_FILENAME: 'Journal.zip',
  PHOTOS_PREFIX: 'photos/',
  MANIFEST_VERSION: '1.0',

  /**
   * Defaults for the config file
   */
  DEFAULT_JOURNAL_NAME: 'Journal',
  DEFAULT_OUTPUT_DIR: 'output',
  DEFAULT_CONFIG_PATH: 'config.json',

  /**
   * Subfolder of the output directory that receives downloaded attachments
   */
  ATTACHMENTS_DIRNAME: 'attachments',
} as const;

/**
 * Extension aliases collapsed to one canonical photo type
 */
export const TYPE_ALIASES: Readonly<Record<string, string>> = {
  jpg: 'jpeg',
  jpe: 'jpeg',
  tif: 'tiff',
};

/**
 * Extensions appended to downloaded files whose name has none
 */
export const MIME_EXTENSIONS: Readonly<Record<string, string>> = {
  'image/jpeg': 'jpeg',
  'image/png': 'png',
  'image/gif': 'gif',
  'image/webp': 'webp',
  'image/heic': 'heic',
  'image/tiff': 'tiff',
};

/**
 * Build the placeholder token for a zero-based attachment index
 */
export function attachmentPlaceholder(index: number): string {
  return CONSTANTS.ATTACHMENT_PLACEHOLDER.replace('%d', String(index));
}
