/**
 * @module render/selector
 * Decides, once per run and before any collaborator call, which backend
 * renders the video.
 */

import type { RemoteRenderConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';

export type BackendSelection =
  | { kind: 'local' }
  | { kind: 'remote'; settings: RemoteRenderConfig };

/**
 * No API key selects the local slideshow. A key with a missing character id
 * is a configuration error, never a silent fallback to local.
 */
export function selectRenderBackend(remote: RemoteRenderConfig): BackendSelection {
  if (!remote.apiKey.trim()) return { kind: 'local' };

  const missing: string[] = [];
  if (!remote.characterIdA.trim()) missing.push('remote.characterIdA');
  if (!remote.characterIdB.trim()) missing.push('remote.characterIdB');
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Remote rendering is enabled but ${missing.join(' and ')} ${missing.length > 1 ? 'are' : 'is'} not set`,
      missing,
    );
  }
  return { kind: 'remote', settings: remote };
}
