/**
 * A response body that is being received, with the length the server
 * declared for it when it declared one.
 */
export interface TransferStream {
  /** Content length announced before the body arrives */
  declaredLength?: number;
  body: AsyncIterable<Uint8Array>;
  /** Release the body without reading it */
  discard?: () => Promise<void>;
}

export interface OpenOptions {
  signal?: AbortSignal;
}

/**
 * Abstraction for byte transfers.
 * Allows testing without actual network requests.
 */
export interface DownloadService {
  /** Start receiving the resource at `url` */
  open(url: string, options?: OpenOptions): Promise<TransferStream>;
}
