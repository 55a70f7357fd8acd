import { Readable } from 'stream';
import {
  atomicWriteStream,
  describeError,
  FetchError,
  redactString,
  type Logger,
} from '@provisioner/shared';

/**
 * Retrieves one remote artifact into a local file. Content-agnostic: binary
 * packages and text documents go through the same path. No retries.
 */
export interface ArtifactFetcher {
  fetch(url: string, destination: string): Promise<void>;
}

export interface HttpArtifactFetcherOptions {
  /** Abort the transfer after this many milliseconds. `0` or unset disables. */
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

function isFsError(error: unknown): boolean {
  return error instanceof Error && 'syscall' in error;
}

export class HttpArtifactFetcher implements ArtifactFetcher {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger?: Logger;

  constructor(options: HttpArtifactFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 0;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger;
  }

  async fetch(url: string, destination: string): Promise<void> {
    const safeUrl = redactString(url).redacted;
    const signal = this.timeoutMs > 0 ? AbortSignal.timeout(this.timeoutMs) : undefined;

    await this.logger?.debug(`GET ${safeUrl} -> ${destination}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { redirect: 'follow', signal });
    } catch (error) {
      throw this.transportError(safeUrl, error, signal);
    }

    if (!response.ok) {
      // Release the connection; the error page is never read.
      await response.body?.cancel();
      throw new FetchError('HttpError', `${safeUrl} responded with HTTP ${response.status}`, {
        status: response.status,
        details: { url: safeUrl, statusText: response.statusText },
      });
    }

    const body = response.body ? Readable.fromWeb(response.body) : Readable.from([]);
    try {
      await atomicWriteStream(destination, body);
    } catch (error) {
      if (isFsError(error)) {
        throw new FetchError('WriteError', `Could not write ${destination}: ${describeError(error)}`, {
          cause: error,
          details: { url: safeUrl, destination },
        });
      }
      throw this.transportError(safeUrl, error, signal);
    }
  }

  private transportError(safeUrl: string, error: unknown, signal?: AbortSignal): FetchError {
    if (signal?.aborted) {
      return new FetchError(
        'NetworkUnreachable',
        `Timed out after ${this.timeoutMs}ms fetching ${safeUrl}`,
        { cause: error, details: { url: safeUrl, reason: 'timeout' } },
      );
    }
    return new FetchError('NetworkUnreachable', `Could not reach ${safeUrl}: ${describeError(error)}`, {
      cause: error,
      details: { url: safeUrl },
    });
  }
}
