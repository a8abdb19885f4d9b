import { CancelledError } from '@/types/pipeline-errors';
import type { ITextTranslator, TranslationRequest, TranslationResponse } from '@/types/translation';

export interface TranslationCacheStorage {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  clear(): void;
}

/** Least-recently-used map bounded by entry count. */
export class LruTranslationStorage implements TranslationCacheStorage {
  private readonly entries = new Map<string, string>();

  constructor(private readonly maxEntries: number = 2000) {}

  get(key: string): string | undefined {
    const value = this.entries.get(key);
    if (value !== undefined) {
      this.entries.delete(key);
      this.entries.set(key, value);
    }
    return value;
  }

  set(key: string, value: string): void {
    this.entries.delete(key);
    this.entries.set(key, value);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export const translationCacheKey = (request: TranslationRequest): string =>
  JSON.stringify([request.from, request.to, request.text]);

interface SharedCall {
  promise: Promise<TranslationResponse>;
  controller: AbortController;
  waiters: number;
}

const abortReason = (signal: AbortSignal): Error => {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new CancelledError();
};

/**
 * Memoises translations by `(from, to, text)`. Concurrent requests for the
 * same key share one upstream call; failures are not cached.
 *
 * The shared call runs under its own signal. A caller whose signal aborts
 * stops waiting without affecting the others; the upstream call is aborted
 * only once no caller is waiting on it.
 */
export class CachingTranslator implements ITextTranslator {
  private readonly inFlight = new Map<string, SharedCall>();

  constructor(
    private readonly inner: ITextTranslator,
    private readonly storage: TranslationCacheStorage = new LruTranslationStorage()
  ) {}

  async translate(request: TranslationRequest): Promise<TranslationResponse> {
    const key = translationCacheKey(request);
    const cached = this.storage.get(key);
    if (cached !== undefined) {
      return { text: cached };
    }
    if (request.signal?.aborted) {
      throw abortReason(request.signal);
    }

    const call = this.inFlight.get(key) ?? this.start(key, request);
    return await this.wait(key, call, request.signal);
  }

  private start(key: string, request: TranslationRequest): SharedCall {
    const controller = new AbortController();
    const { from, to, text } = request;
    const promise = this.inner.translate({ from, to, text, signal: controller.signal }).then((response) => {
      this.storage.set(key, response.text);
      return response;
    });
    const call: SharedCall = { promise, controller, waiters: 0 };
    const forget = (): void => {
      if (this.inFlight.get(key) === call) this.inFlight.delete(key);
    };
    promise.then(forget, forget);
    this.inFlight.set(key, call);
    return call;
  }

  private wait(key: string, call: SharedCall, signal?: AbortSignal): Promise<TranslationResponse> {
    call.waiters += 1;
    return new Promise<TranslationResponse>((resolve, reject) => {
      let settled = false;

      const leave = (): boolean => {
        if (settled) return false;
        settled = true;
        call.waiters -= 1;
        signal?.removeEventListener('abort', onAbort);
        return true;
      };

      const onAbort = (): void => {
        if (!signal || !leave()) return;
        if (call.waiters === 0) {
          if (this.inFlight.get(key) === call) this.inFlight.delete(key);
          call.controller.abort(new CancelledError('Translation is no longer awaited.'));
        }
        reject(abortReason(signal));
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      call.promise.then(
        (response) => {
          if (leave()) resolve(response);
        },
        (error: unknown) => {
          if (leave()) reject(error);
        }
      );
    });
  }

  async destroy(): Promise<void> {
    for (const call of this.inFlight.values()) {
      call.controller.abort(new CancelledError('Translator was destroyed.'));
    }
    this.inFlight.clear();
    this.storage.clear();
    await this.inner.destroy();
  }
}
