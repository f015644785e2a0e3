import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parseModelProfiles } from '@vramfit/protocol';
import type { ModelProfile } from '@vramfit/protocol';

export const DEFAULT_MODEL_PROFILES_PATH = join(__dirname, '..', 'data', 'model-profiles.json');

export type ModelProfileCatalog = {
  find: (name: string) => ModelProfile | undefined;
  list: () => ModelProfile[];
};

export const createModelProfileCatalog = (profiles: readonly ModelProfile[]): ModelProfileCatalog => {
  const byName = new Map<string, ModelProfile>();
  for (const profile of profiles) {
    if (byName.has(profile.name)) {
      throw new Error(`duplicate model profile '${profile.name}'`);
    }
    byName.set(profile.name, profile);
  }
  return {
    find: (name) => byName.get(name),
    list: () => [...byName.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)),
  };
};

export const loadModelProfiles = (path = DEFAULT_MODEL_PROFILES_PATH): ModelProfileCatalog => {
  if (!existsSync(path)) {
    throw new Error(`model profile file not found: ${path}`);
  }
  const parsed = parseModelProfiles(JSON.parse(readFileSync(path, 'utf8')));
  if (!parsed.ok) {
    throw new Error(`invalid model profile file ${path}: ${parsed.errors.join('; ')}`);
  }
  return createModelProfileCatalog(parsed.value);
};
