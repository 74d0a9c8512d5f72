/**
 * JSON file state store
 *
 * Writes go to a temporary file that is renamed over the target, so a
 * crash mid-write leaves the previous state intact.
 */

import { promises as fs } from 'fs';
import path from 'path';

import { parsePersistedState } from './persistence';

import type { Logger } from '@logging';
import type { PersistedEngineState, RuntimeStateStore } from './types';

/**
 * Create a store backed by one JSON file
 *
 * A missing file loads as null. An unreadable or malformed file is logged
 * and also loads as null, so the engine starts from defaults.
 *
 * @param filePath - Target file
 * @param logger - Logger for load problems
 */
export function createJsonFileStateStore(filePath: string, logger: Logger): RuntimeStateStore {
  async function load(): Promise<PersistedEngineState | null> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        return null;
      }
      logger.warning("State file " + filePath + " unreadable: " + describe(err));
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      logger.warning("State file " + filePath + " is not valid JSON: " + describe(err));
      return null;
    }

    const state = parsePersistedState(data, function(zoneId: string) {
      logger.warning("Ignoring invalid saved state for zone " + zoneId);
    });
    if (state === null) {
      logger.warning("State file " + filePath + " has an unsupported format, ignored");
    }
    return state;
  }

  async function save(state: PersistedEngineState): Promise<void> {
    const tmpPath = filePath + ".tmp";
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tmpPath, JSON.stringify(state, null, 2) + "\n", 'utf8');
    await fs.rename(tmpPath, filePath);
  }

  return { load: load, save: save };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
