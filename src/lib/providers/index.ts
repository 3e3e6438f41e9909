/**
 * Provider Registry
 *
 * Registration order is the order providers run in, and so the order of
 * the merged record list.
 */

import type { Env } from '../paths.js';
import { AmpProvider } from './amp.js';
import { ClaudeProvider } from './claude.js';
import { CodexProvider } from './codex.js';
import { DroidProvider } from './droid.js';
import { GeminiProvider } from './gemini.js';
import { KimiProvider } from './kimi.js';
import { OpenclawProvider } from './openclaw.js';
import { OpencodeProvider } from './opencode.js';
import { PiProvider } from './pi.js';
import type { Provider } from './types.js';

export * from './types.js';
export { discoverFiles, computeProviderRoots, fingerprintFile } from './discovery.js';
export { discoverAndParseWith, mapWithConcurrency, resolveConcurrency } from './pipeline.js';

export const PROVIDER_NAMES = ['claude', 'codex', 'pi', 'amp', 'opencode', 'gemini', 'droid', 'kimi', 'openclaw'] as const;

export function allProviders(env: Env = process.env): Provider[] {
  return [
    new ClaudeProvider(env),
    new CodexProvider(env),
    new PiProvider(env),
    new AmpProvider(env),
    new OpencodeProvider(env),
    new GeminiProvider(env),
    new DroidProvider(env),
    new KimiProvider(env),
    new OpenclawProvider(env),
  ];
}

/**
 * Every root directory of every provider, deduplicated
 */
export function allWatchPaths(providers: Provider[]): string[] {
  const paths = new Set<string>();
  for (const provider of providers) {
    for (const root of provider.rootDirs()) {
      paths.add(root);
    }
  }
  return [...paths];
}
