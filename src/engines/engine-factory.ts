import type { IOCREngine } from '@/types/ocr-engine';
import { TesseractEngine, type TesseractSegmentation } from './tesseract-engine';

export interface EngineOptions {
  language: string;
  segmentation: TesseractSegmentation;
}

export type EngineFactoryCreator = (options: EngineOptions) => IOCREngine;

/**
 * Lazily creates and loads one engine per (language, segmentation) and hands
 * the same instance to every caller. A failed load is forgotten so the next
 * caller retries it.
 */
export class EnginePool {
  private readonly engines = new Map<string, Promise<IOCREngine>>();

  constructor(
    private readonly creator: EngineFactoryCreator = (options) => new TesseractEngine(options)
  ) {}

  acquire(language: string, segmentation: TesseractSegmentation): Promise<IOCREngine> {
    const key = `${language}:${segmentation}`;
    const existing = this.engines.get(key);
    if (existing) {
      return existing;
    }

    const loading = this.load({ language, segmentation });
    this.engines.set(key, loading);
    loading.catch(() => {
      if (this.engines.get(key) === loading) {
        this.engines.delete(key);
      }
    });
    return loading;
  }

  async destroyAll(): Promise<void> {
    const pending = Array.from(this.engines.values());
    this.engines.clear();
    const settled = await Promise.allSettled(pending);
    await Promise.all(
      settled.map((result) => (result.status === 'fulfilled' ? result.value.destroy() : undefined))
    );
  }

  private async load(options: EngineOptions): Promise<IOCREngine> {
    const engine = this.creator(options);
    await engine.load();
    return engine;
  }
}
