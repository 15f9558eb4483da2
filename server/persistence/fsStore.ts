import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import { toDailyArticlesRecord, toRunMetadataRecord, type ArtifactStore } from '../../shared/artifacts';
import type { DailyArticles } from '../../shared/types';
import { compactDay } from '../utils/dates';

const ensureDir = async (dir: string) => {
  await fs.mkdir(dir, { recursive: true });
};

const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Attempted to write outside of persistence root: ${target}`);
  }
};

const writeJson = async (root: string, target: string, data: unknown) => {
  guardPath(root, target);
  await ensureDir(path.dirname(target));
  await fs.writeFile(target, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
};

export const createFsArtifactStore = (config: Pick<AppConfig, 'persistence'>): ArtifactStore => {
  const { rootDir, articlesDir, metadataDir } = config.persistence;

  const ensureLayout = async () => {
    await ensureDir(rootDir);
    await ensureDir(articlesDir);
    await ensureDir(metadataDir);
  };

  const saveDailyArticles = async (daily: DailyArticles) => {
    const stamp = compactDay(daily.date);
    const articlesPath = path.join(articlesDir, `articles_${stamp}.json`);
    const metadataPath = path.join(metadataDir, `metadata_${stamp}.json`);
    await writeJson(rootDir, articlesPath, toDailyArticlesRecord(daily));
    await writeJson(rootDir, metadataPath, toRunMetadataRecord(daily.metadata));
    return { articlesPath, metadataPath };
  };

  return {
    ensureLayout,
    saveDailyArticles,
  };
};
