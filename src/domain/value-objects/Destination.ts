const STREAM_URL_PATTERN = /^(rtmps?|srt|https?):\/\/.+/i;
const SECRET_SEGMENT_PATTERN =
  /((?:rtmps?|srt|https?):\/\/[^\s'"]*\/)([^\s/'":]+)/gi;

export const maskKey = (key: string, visible = 4): string => {
  if (key.length <= visible) {
    return "****";
  }
  return "*".repeat(key.length - visible) + key.slice(-visible);
};

/**
 * Masks the last path segment, query string included, of every publish URL
 * found in `text`.
 */
export const redactSecrets = (text: string): string =>
  text.replace(
    SECRET_SEGMENT_PATTERN,
    (_match, prefix: string, secret: string) => `${prefix}${maskKey(secret)}`
  );

export class Destination {
  private constructor(
    private readonly _endpoint: string,
    private readonly _key: string
  ) {
    this.validate(_endpoint);
  }

  public static create(endpoint: string, key: string): Destination {
    return new Destination(endpoint.trim(), key.trim());
  }

  private validate(endpoint: string): void {
    if (!endpoint || endpoint.length === 0) {
      throw new Error("Destination endpoint cannot be empty");
    }

    if (!STREAM_URL_PATTERN.test(endpoint)) {
      throw new Error(
        "Invalid destination endpoint. Must start with rtmp://, rtmps://, srt://, http:// or https://"
      );
    }
  }

  public get endpoint(): string {
    return this._endpoint.replace(/\/+$/, "");
  }

  /** Full publish URL. Contains the secret key: never log this value. */
  public get url(): string {
    return this._key ? `${this.endpoint}/${this._key}` : this.endpoint;
  }

  public get key(): string {
    return this._key;
  }

  public get maskedKey(): string {
    return maskKey(this._key);
  }

  public get masked(): string {
    return this._key ? `${this.endpoint}/${this.maskedKey}` : this.endpoint;
  }

  /** Replaces every occurrence of this destination's key in `text`. */
  public redact(text: string): string {
    if (!this._key) {
      return text;
    }
    return text.split(this._key).join(this.maskedKey);
  }

  public equals(other: Destination): boolean {
    return this.url === other.url;
  }

  public toString(): string {
    return this.masked;
  }

  public toJSON(): { endpoint: string; key: string } {
    return { endpoint: this.endpoint, key: this.maskedKey };
  }
}
