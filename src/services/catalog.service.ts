import type { CatalogSession } from '../db/session.js';
import { persist } from '../db/session.js';
import type { Collection, Creator, Model, ModelFile } from '../db/schema/index.js';
import type { ScannedFile } from '../types/catalog.js';
import { generateSlug } from '../utils/slug.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('CatalogService');

export interface Upserted<T> {
  row: T;
  created: boolean;
}

export interface CreateModelData {
  name: string;
  path: string;
  libraryId: number;
  creatorId: number;
  collectionId: number;
}

export class CatalogService {
  /**
   * Find a creator by exact (case-sensitive) name, or create and commit it.
   */
  async getOrCreateCreator(session: CatalogSession, name: string): Promise<Upserted<Creator>> {
    const existing = await session.query('creator').filterBy({ name }).first();
    if (existing) {
      return { row: existing, created: false };
    }

    const now = new Date();
    const row = await persist(session, 'creator', {
      name,
      slug: generateSlug(name),
      createdAt: now,
      updatedAt: now,
    });

    logger.info({ creatorId: row.id, name }, 'Created creator');
    return { row, created: true };
  }

  /**
   * Find a collection by exact name, or create and commit it as a top-level
   * collection. Names are unique across all collections, so the parent is not
   * part of the lookup.
   */
  async getOrCreateCollection(
    session: CatalogSession,
    name: string,
  ): Promise<Upserted<Collection>> {
    const existing = await session.query('collection').filterBy({ name }).first();
    if (existing) {
      return { row: existing, created: false };
    }

    const now = new Date();
    const row = await persist(session, 'collection', {
      name,
      slug: generateSlug(name),
      collectionId: null,
      createdAt: now,
      updatedAt: now,
    });

    logger.info({ collectionId: row.id, name }, 'Created collection');
    return { row, created: true };
  }

  // Models and files are plain inserts: a repeated scan adds new rows.

  async createModel(session: CatalogSession, data: CreateModelData): Promise<Model> {
    const now = new Date();
    return persist(session, 'model', {
      name: data.name,
      path: data.path,
      libraryId: data.libraryId,
      creatorId: data.creatorId,
      collectionId: data.collectionId,
      slug: generateSlug(data.name),
      createdAt: now,
      updatedAt: now,
    });
  }

  async createModelFile(
    session: CatalogSession,
    modelId: number,
    file: ScannedFile,
  ): Promise<ModelFile> {
    const now = new Date();
    return persist(session, 'modelFile', {
      filename: file.filename,
      modelId,
      createdAt: now,
      updatedAt: now,
      presupported: false,
      yUp: false,
      digest: file.digest,
      notes: '',
      caption: '',
      size: file.sizeBytes,
      presupportedVersionId: null,
    });
  }
}

export const catalogService = new CatalogService();
