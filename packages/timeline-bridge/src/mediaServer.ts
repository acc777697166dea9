export const TOKEN_PARAM = 'X-Plex-Token';
export const TIMELINE_PATH = '/:/timeline';

/**
 * @hebrew שרת המדיה שממנו מגיע תור הניגון. כל כתובת שנבנית מולו נושאת את הטוקן.
 */
export class MediaServer {
  constructor(
    readonly protocol: string,
    readonly address: string,
    readonly port: number | null,
    readonly token: string | null = null,
  ) {}

  /** יוצר שרת מכתובת מלאה. הטוקן נלקח מהפרמטר X-Plex-Token */
  static fromUrl(url: string | URL): MediaServer {
    const parsed = new URL(url);
    return new MediaServer(
      parsed.protocol.replace(/:$/, ''),
      parsed.hostname,
      parsed.port ? Number(parsed.port) : null,
      parsed.searchParams.get(TOKEN_PARAM),
    );
  }

  get baseUrl(): string {
    const port = this.port === null ? '' : `:${this.port}`;
    return `${this.protocol}://${this.address}${port}`;
  }

  buildUrl(key: string): string {
    const url = new URL(key, this.baseUrl);
    if (this.token) {
      url.searchParams.set(TOKEN_PARAM, this.token);
    }
    return url.toString();
  }

  timelineUrl(): string {
    return this.buildUrl(TIMELINE_PATH);
  }
}
