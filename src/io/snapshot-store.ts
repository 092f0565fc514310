import type { Logger } from '../bootstrap/logger.js';
import { fromDisk, toDisk } from '../modules/portfolio/snapshot.js';
import type { PortfolioSnapshot } from '../modules/portfolio/types.js';
import { readTextIfExists, writeFileAtomic } from './files.js';

export interface SnapshotStore {
  readonly path: string;
  /** `null` when there is no usable prior snapshot. */
  read(): Promise<PortfolioSnapshot | null>;
  write(snapshot: PortfolioSnapshot): Promise<void>;
}

export const serializeSnapshot = (snapshot: PortfolioSnapshot): string =>
  `${JSON.stringify(toDisk(snapshot), null, 2)}\n`;

export function createFileSnapshotStore(filePath: string, logger: Logger): SnapshotStore {
  return {
    path: filePath,
    async read() {
      let text: string | null;
      try {
        text = await readTextIfExists(filePath);
      } catch (error) {
        logger.warn('[store] prior snapshot unreadable', { path: filePath, error });
        return null;
      }

      if (text === null) {
        logger.info('[store] no prior snapshot', { path: filePath });
        return null;
      }

      try {
        const { snapshot, dropped } = fromDisk(JSON.parse(text));
        if (dropped > 0) {
          logger.warn('[store] dropped invalid positions from prior snapshot', { path: filePath, dropped });
        }
        return snapshot;
      } catch (error) {
        logger.warn('[store] prior snapshot invalid', { path: filePath, error });
        return null;
      }
    },
    async write(snapshot) {
      await writeFileAtomic(filePath, serializeSnapshot(snapshot));
      logger.info('[store] snapshot written', {
        path: filePath,
        sectorRotation: snapshot.sectorRotation.length,
        longTerm: snapshot.longTerm.length,
      });
    },
  };
}
