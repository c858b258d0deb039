export interface ParsedModelPath {
  creatorName: string;
  collectionName: string;
  /** Directory name with the trailing variant token removed */
  modelName: string;
  /** Token after the last separator, typically a UUID or numeric id */
  variant: string;
}

export interface ImportOptions {
  rootFolder: string;
  libraryId: number;
  databaseUrl?: string;
  dryRun: boolean;
}

export interface ImportSummary {
  creatorsCreated: number;
  creatorsReused: number;
  collectionsCreated: number;
  collectionsReused: number;
  models: number;
  files: number;
  totalSizeBytes: number;
}

export interface ScannedFile {
  /** Path relative to the model directory, always '/'-separated */
  filename: string;
  absolutePath: string;
  sizeBytes: number;
  digest: string;
}
