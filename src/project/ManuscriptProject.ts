/**
 * ManuscriptProject - one project directory, its persisted stores
 *
 * Layout:
 *   <root>/outline.json
 *   <root>/manuscript.config.json
 *   <root>/.manuscript/versions/<sectionId>.jsonl
 *   <root>/.manuscript/bibliography.jsonl
 *   <root>/.manuscript/corpus/sources.jsonl
 *
 * Everything can be rebuilt from these files alone.
 */

import * as path from 'path';
import type { FileSystem } from '../storage/FileSystem';
import { RealFileSystem } from '../storage/FileSystem';
import { VersionStore } from '../version-store/VersionStore';
import { Bibliography } from '../citation-resolver/Bibliography';
import { CitationResolver } from '../citation-resolver/CitationResolver';
import { SourceCorpus } from '../source-corpus/SourceCorpus';
import { ContextAssembler } from '../context-assembler/ContextAssembler';
import type { GenerativeService } from '../generative/types';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG, type ManuscriptConfig } from '../config/config';
import { StorageError } from '../errors';
import { Pipeline } from '../pipeline/Pipeline';
import { loadOutline, saveOutline, type Outline } from '../pipeline/outline';

export const STATE_DIR = '.manuscript';
export const OUTLINE_FILE = 'outline.json';

export interface ProjectPaths {
  root: string;
  stateDir: string;
  versionsDir: string;
  bibliographyFile: string;
  corpusDir: string;
  sourcesFile: string;
  outlineFile: string;
  configFile: string;
}

export function projectPaths(root: string): ProjectPaths {
  const stateDir = path.join(root, STATE_DIR);
  const corpusDir = path.join(stateDir, 'corpus');
  return {
    root,
    stateDir,
    versionsDir: path.join(stateDir, 'versions'),
    bibliographyFile: path.join(stateDir, 'bibliography.jsonl'),
    corpusDir,
    sourcesFile: path.join(corpusDir, 'sources.jsonl'),
    outlineFile: path.join(root, OUTLINE_FILE),
    configFile: path.join(root, CONFIG_FILE_NAME),
  };
}

export class ManuscriptProject {
  readonly paths: ProjectPaths;
  readonly versions: VersionStore;
  readonly bibliography: Bibliography;
  readonly citations: CitationResolver;
  readonly corpus: SourceCorpus;
  readonly assembler: ContextAssembler;

  constructor(
    root: string,
    readonly fs: FileSystem = new RealFileSystem(),
    readonly config: ManuscriptConfig = DEFAULT_CONFIG
  ) {
    this.paths = projectPaths(root);
    this.versions = new VersionStore(fs, {
      versionsDir: this.paths.versionsDir,
      lockTimeoutMs: config.lockTimeoutMs,
    });
    this.bibliography = new Bibliography(fs, {
      filePath: this.paths.bibliographyFile,
      lockTimeoutMs: config.lockTimeoutMs,
    });
    this.citations = new CitationResolver(this.bibliography, this.versions);
    this.corpus = new SourceCorpus(fs, { filePath: this.paths.sourcesFile });
    this.assembler = new ContextAssembler({ safetyMargin: config.context.safetyMargin });
  }

  /**
   * Create the state directories and load the bibliography and corpus
   */
  async init(): Promise<void> {
    try {
      await this.fs.mkdir(this.paths.stateDir);
      await this.fs.mkdir(this.paths.corpusDir);
    } catch (error) {
      throw new StorageError('init', this.paths.stateDir, error);
    }
    await this.versions.init();
    await this.citations.init();
    await this.corpus.load();
  }

  loadOutline(): Promise<Outline> {
    return loadOutline(this.fs, this.paths.outlineFile);
  }

  saveOutline(outline: Outline): Promise<void> {
    return saveOutline(this.fs, this.paths.outlineFile, outline);
  }

  /**
   * Pipeline over this project's stores and the current outline
   */
  async createPipeline(service: GenerativeService): Promise<Pipeline> {
    const outline = await this.loadOutline();
    return new Pipeline(
      {
        versions: this.versions,
        corpus: this.corpus,
        citations: this.citations,
        assembler: this.assembler,
        service,
        outline,
      },
      {
        maxContextTokens: this.config.context.maxTokens,
        timeoutMs: this.config.generation.timeoutMs,
        maxOutputTokens: this.config.generation.maxOutputTokens,
      }
    );
  }
}

export async function openProject(
  root: string,
  fs?: FileSystem,
  config?: ManuscriptConfig
): Promise<ManuscriptProject> {
  const project = new ManuscriptProject(root, fs, config);
  await project.init();
  return project;
}
