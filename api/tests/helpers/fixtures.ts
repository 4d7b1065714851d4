/**
 * Shared test fixtures: configuration, a small corpus, fake sockets
 */

import { loadConfig, type AppConfig } from '@/config/env';
import { parseCorpus } from '@/services/corpus.service';
import type { SocketChannel } from '@/gateway/socketGateway';

export const TEST_ENV = {
  PROVIDER_API_KEY: 'test-key',
  PROVIDER_MODEL: 'test-model',
  PROVIDER_BASE_URL: 'https://provider.test/api',
  EMBEDDING_BASE_URL: 'https://embeddings.test',
  TRANSCRIPTION_BASE_URL: 'https://speech.test',
  PROVIDER_RETRY_BASE_MS: '10',
  PROVIDER_RETRY_MAX_MS: '40',
} as const;

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({ ...TEST_ENV, ...overrides });
}

export const LOVE_PASSAGE = 'O Son of Being! Love Me, that I may love thee. If thou lovest Me not, My love can in no wise reach thee.';
export const PATIENCE_PASSAGE = 'Be patient in hardship and steady in waiting, for the harvest ripens slowly under a quiet sky.';
export const GARDEN_PASSAGE = 'O Friend! In the garden of thy heart plant naught but the rose of devotion.';

export function testPassages() {
  return parseCorpus([PATIENCE_PASSAGE, LOVE_PASSAGE, GARDEN_PASSAGE].join('\n\n'));
}

/** Records every frame the gateway sends; can be told to fail. */
export class FakeChannel implements SocketChannel {
  readonly sent: string[] = [];
  closed?: { code?: number; reason?: string };
  failSends = false;

  send(data: string): void {
    if (this.failSends) {
      throw new Error('Socket not open');
    }
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
  }

  frames(): unknown[] {
    return this.sent.map((frame) => JSON.parse(frame));
  }
}

export const noSleep = async (_ms: number): Promise<void> => {};
