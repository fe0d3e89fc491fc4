import { UnknownBackendError } from '../../types/errors.js';
import { BACKEND_IDS, type BackendId } from '../../types/index.js';
import { chatGptBackend } from './chatgpt.js';
import { deeplBackend } from './deepl.js';
import type { BackendDefinition } from './definition.js';
import { googleBackend } from './google.js';
import { microsoftBackend } from './microsoft.js';
import { myMemoryBackend } from './mymemory.js';
import { yandexBackend } from './yandex.js';

export type { BackendCapabilities, BackendDeps, BackendDefinition, TranslationBackend } from './definition.js';

export const BACKENDS: Readonly<Record<BackendId, BackendDefinition>> = {
  google: googleBackend,
  mymemory: myMemoryBackend,
  microsoft: microsoftBackend,
  yandex: yandexBackend,
  chatgpt: chatGptBackend,
  deepl: deeplBackend,
};

export function listBackends(): BackendDefinition[] {
  return BACKEND_IDS.map((id) => BACKENDS[id]);
}

/** Looks a backend up by id or display name. */
export function findBackend(name: string): BackendDefinition {
  const found = listBackends().find((backend) => backend.id === name || backend.displayName === name);
  if (!found) {
    throw new UnknownBackendError(name);
  }
  return found;
}

