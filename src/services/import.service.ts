import fsPromises from 'node:fs/promises';
import path from 'node:path';
import type { CatalogSession } from '../db/session.js';
import type { ImportSummary } from '../types/catalog.js';
import { catalogService, type CatalogService } from './catalog.service.js';
import { fileProcessingService, type FileProcessingService } from './file-processing.service.js';
import { parseModelPath, toRelativePath } from '../utils/model-path.js';
import { AppError, configError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ImportService');

export interface LibraryImport {
  rootFolder: string;
  libraryId: number;
}

function emptySummary(): ImportSummary {
  return {
    creatorsCreated: 0,
    creatorsReused: 0,
    collectionsCreated: 0,
    collectionsReused: 0,
    models: 0,
    files: 0,
    totalSizeBytes: 0,
  };
}

export class ImportService {
  constructor(
    private readonly catalog: CatalogService = catalogService,
    private readonly files: FileProcessingService = fileProcessingService,
  ) {}

  /**
   * Walk <root>/<creator>/<collection>/<model> and write one row per creator,
   * collection, model and file. Every row is committed as soon as it is built,
   * so a failure part-way leaves earlier rows in place.
   */
  async importLibrary(session: CatalogSession, options: LibraryImport): Promise<ImportSummary> {
    const root = path.resolve(options.rootFolder);
    await this.assertDirectory(root);

    const summary = emptySummary();
    logger.info({ root, libraryId: options.libraryId }, 'Import started');

    for (const creatorPath of await this.files.listSubdirectories(root)) {
      logger.info({ creator: path.basename(creatorPath) }, 'Processing creator');

      for (const collectionPath of await this.files.listSubdirectories(creatorPath)) {
        logger.info({ collection: path.basename(collectionPath) }, 'Processing collection');

        for (const modelPath of await this.files.listSubdirectories(collectionPath)) {
          await this.importModel(session, root, modelPath, options.libraryId, summary);
        }
      }
    }

    logger.info({ root, ...summary }, 'Import finished');
    return summary;
  }

  private async importModel(
    session: CatalogSession,
    root: string,
    modelPath: string,
    libraryId: number,
    summary: ImportSummary,
  ): Promise<void> {
    logger.info({ model: path.basename(modelPath) }, 'Processing model');

    // Parse before touching the database so a malformed name writes nothing for this model.
    const { creatorName, collectionName, modelName, variant } = parseModelPath(modelPath);

    const creator = await this.catalog.getOrCreateCreator(session, creatorName);
    if (creator.created) summary.creatorsCreated++;
    else summary.creatorsReused++;

    const collection = await this.catalog.getOrCreateCollection(session, collectionName);
    if (collection.created) summary.collectionsCreated++;
    else summary.collectionsReused++;

    const model = await this.catalog.createModel(session, {
      name: modelName,
      path: toRelativePath(root, modelPath),
      libraryId,
      creatorId: creator.row.id,
      collectionId: collection.row.id,
    });
    summary.models++;

    let fileCount = 0;
    for await (const file of this.files.walkFiles(modelPath)) {
      logger.info({ modelId: model.id, file: file.filename, path: file.absolutePath }, 'Processing file');
      await this.catalog.createModelFile(session, model.id, file);
      fileCount++;
      summary.files++;
      summary.totalSizeBytes += file.sizeBytes;
    }

    logger.info(
      { modelId: model.id, name: modelName, variant, path: model.path, fileCount },
      'Model imported',
    );
  }

  private async assertDirectory(root: string): Promise<void> {
    try {
      const stat = await fsPromises.stat(root);
      if (!stat.isDirectory()) {
        throw configError(`Root folder is not a directory: ${root}`, 'rootFolder');
      }
    } catch (err) {
      if (err instanceof AppError) throw err;
      const code = (err as NodeJS.ErrnoException).code;
      if (code === 'ENOENT') {
        throw configError(`Root folder does not exist: ${root}`, 'rootFolder');
      }
      throw configError(
        `Cannot access root folder ${root}: ${err instanceof Error ? err.message : String(err)}`,
        'rootFolder',
      );
    }
  }
}

export const importService = new ImportService();
