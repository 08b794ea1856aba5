#!/usr/bin/env node
/**
 * manuscript CLI
 *
 * Thin front end over the project stores and the pipeline
 */

import { config as loadEnv } from 'dotenv';
import { Command } from 'commander';
import * as path from 'path';

import { loadConfig, CONFIG_FILE_NAME, type ManuscriptConfig } from './src/config';
import { openProject, type ManuscriptProject } from './src/project';
import { AnthropicService, TemplateService, withRetry, type GenerativeService } from './src/generative';
import { CITATION_FORMATS, type BibliographyStyle, type CitationFormat } from './src/citation-resolver';
import { TextFileExtractor, SOURCE_KINDS, type SourceKind } from './src/source-corpus';
import { formatDiff } from './src/version-store';
import { isPolishFocus, POLISH_FOCI, type ReviseAllOutcome } from './src/pipeline';
import { RealFileSystem } from './src/storage';
import { ConfigurationError, VersionNotFoundError, toManuscriptError } from './src/errors';

loadEnv();

// Colors for console output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
};

function log(message: string, color: string = colors.reset) {
  console.log(`${color}${message}${colors.reset}`);
}

type GlobalOptions = {
  project: string;
  ai: boolean;
};

const program = new Command();
const fs = new RealFileSystem();
const abort = new AbortController();

process.once('SIGINT', () => {
  log('\nCancelling...', colors.yellow);
  abort.abort();
});

program
  .name('manuscript')
  .description('Versioned section drafting with budgeted context and managed citations')
  .version('0.1.0')
  .option('-p, --project <dir>', 'Project directory', process.cwd())
  .option('--no-ai', 'Use the deterministic template service instead of a model');

// ============================================================================
// Helpers
// ============================================================================

async function context(): Promise<{ project: ManuscriptProject; config: ManuscriptConfig; ai: boolean }> {
  const options = program.opts<GlobalOptions>();
  const root = path.resolve(options.project);
  const config = await loadConfig({ env: process.env, projectFile: path.join(root, CONFIG_FILE_NAME), fs });
  process.env.MANUSCRIPT_LOG_LEVEL = config.logLevel;
  const project = await openProject(root, fs, config);
  return { project, config, ai: options.ai };
}

function createService(config: ManuscriptConfig, ai: boolean): GenerativeService {
  if (!ai) return new TemplateService();

  const service = new AnthropicService({
    apiKey: config.anthropic.apiKey ?? '',
    baseUrl: config.anthropic.baseUrl,
    model: config.anthropic.model,
    timeoutMs: config.generation.timeoutMs,
    maxTokens: config.generation.maxOutputTokens,
    temperature: config.generation.temperature,
  });

  return withRetry(service, {
    maxRetries: config.generation.maxRetries,
    initialDelayMs: config.generation.initialDelayMs,
    maxDelayMs: config.generation.maxDelayMs,
  });
}

async function pipeline() {
  const { project, config, ai } = await context();
  return { project, config, pipeline: await project.createPipeline(createService(config, ai)) };
}

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

function parsePositive(value: string, label: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`${label} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

function parseVersion(value: string): number {
  return parsePositive(value, 'Version');
}

function parseFormat(value: string | undefined, fallback: CitationFormat): CitationFormat {
  if (value === undefined) return fallback;
  const format = CITATION_FORMATS.find(f => f === value);
  if (!format) {
    throw new ConfigurationError(`Unknown format '${value}' (expected ${CITATION_FORMATS.join(' or ')})`);
  }
  return format;
}

function parseStyle(value: string | undefined, fallback: BibliographyStyle): BibliographyStyle {
  if (value === undefined) return fallback;
  if (value !== 'apa' && value !== 'ieee') {
    throw new ConfigurationError(`Unknown style '${value}' (expected apa or ieee)`);
  }
  return value;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function printOutcome(outcome: ReviseAllOutcome) {
  if (outcome.status === 'revised' && outcome.snapshot) {
    log(`  ✓ ${outcome.sectionId} → v${outcome.snapshot.versionNumber} (${outcome.snapshot.wordCount} words)`, colors.green);
  } else if (outcome.status === 'skipped') {
    log(`  - ${outcome.sectionId} skipped`, colors.dim);
  } else {
    log(`  ✗ ${outcome.sectionId}: ${outcome.error ?? 'failed'}`, colors.red);
  }
}

// ============================================================================
// Sources
// ============================================================================

const sources = program.command('sources').description('Manage the source corpus');

sources
  .command('add <file>')
  .description('Extract a text or Markdown file into the corpus')
  .option('--title <title>', 'Title (default: first heading or file name)')
  .option('--authors <names>', 'Comma-separated authors')
  .option('--year <year>', 'Publication year')
  .option('--url <url>', 'Source URL')
  .option('--key <key>', 'Citation key')
  .option('--keywords <words>', 'Comma-separated keywords')
  .option('--kind <kind>', `Source kind (${SOURCE_KINDS.join(', ')})`)
  .action(
    async (
      file: string,
      options: { title?: string; authors?: string; year?: string; url?: string; key?: string; keywords?: string; kind?: string }
    ) => {
      const { project } = await context();
      const extractor = new TextFileExtractor(fs);
      const location = path.resolve(file);

      if (!extractor.supports(location)) {
        throw new ConfigurationError(`No extractor for ${file}; extract PDF and web sources to text first`);
      }

      const kind: SourceKind | undefined = SOURCE_KINDS.find(k => k === options.kind);
      if (options.kind && !kind) {
        throw new ConfigurationError(`Unknown source kind '${options.kind}'`);
      }

      const input = await extractor.extract(location);
      const doc = await project.corpus.add({
        ...input,
        kind: kind ?? input.kind,
        title: options.title ?? input.title,
        metadata: {
          authors: parseList(options.authors),
          year: options.year,
          url: options.url,
          citationKey: options.key,
          keywords: parseList(options.keywords),
        },
      });

      log(`✓ Added ${doc.id}: ${doc.title}`, colors.green);
    }
  );

sources
  .command('list')
  .description('List sources in corpus order')
  .action(async () => {
    const { project } = await context();
    const docs = await project.corpus.list();
    if (docs.length === 0) {
      log('No sources yet', colors.yellow);
      return;
    }
    for (const doc of docs) {
      const authors = doc.metadata.authors.join(', ') || 'unknown';
      log(`${doc.id}  [${doc.kind}] ${doc.title} (${authors}${doc.metadata.year ? `, ${doc.metadata.year}` : ''})`);
    }
  });

sources
  .command('remove <id>')
  .description('Remove a source from the corpus')
  .action(async (id: string) => {
    const { project } = await context();
    await project.corpus.remove(id);
    log(`✓ Removed ${id}`, colors.green);
  });

// ============================================================================
// Outline
// ============================================================================

const outline = program.command('outline').description('Inspect or extend outline.json');

outline
  .command('show')
  .description('Print the outline sections')
  .action(async () => {
    const { project } = await context();
    const current = await project.loadOutline();
    if (current.sections.length === 0) {
      log('Outline is empty', colors.yellow);
      return;
    }
    for (const section of current.sections) {
      log(`${section.id}: ${section.title} (${section.wordCountTarget} words)`, colors.bright);
    }
  });

outline
  .command('add <id> <title>')
  .description('Append a section to the outline')
  .option('--objective <text>', 'Objective (repeatable)', collect, [])
  .option('--point <text>', 'Key point (repeatable)', collect, [])
  .option('--words <n>', 'Word count target', '1000')
  .option('--guidance <text>', 'Drafting guidance')
  .action(async (id: string, title: string, options: { objective: string[]; point: string[]; words: string; guidance?: string }) => {
    const { project } = await context();
    const current = await project.loadOutline();
    if (current.sections.some(s => s.id === id)) {
      throw new ConfigurationError(`Section '${id}' already exists in the outline`);
    }
    current.sections.push({
      id,
      title,
      objectives: options.objective,
      keyPoints: options.point,
      wordCountTarget: parsePositive(options.words, 'Word count target'),
      guidance: options.guidance,
    });
    await project.saveOutline(current);
    log(`✓ Added section ${id}`, colors.green);
  });

// ============================================================================
// Drafting and revision
// ============================================================================

program
  .command('draft <section>')
  .description('Draft a section from the outline and corpus')
  .option('--guidance <text>', 'Extra guidance for this draft')
  .option('--focus <terms>', 'Comma-separated focus terms for source ranking')
  .action(async (section: string, options: { guidance?: string; focus?: string }) => {
    const { pipeline: p } = await pipeline();
    const { snapshot, citations } = await p.draft(section, {
      guidance: options.guidance,
      focusTerms: parseList(options.focus),
      signal: abort.signal,
    });
    log(`✓ ${section} v${snapshot.versionNumber}: ${snapshot.wordCount} words, ${snapshot.citationKeys.length} citations`, colors.green);
    if (citations.unresolved.length > 0) {
      log(`  Unresolved citations: ${citations.unresolved.join(', ')}`, colors.yellow);
    }
  });

program
  .command('revise <section>')
  .description('Revise a section against feedback')
  .requiredOption('-f, --feedback <text>', 'Feedback to address')
  .action(async (section: string, options: { feedback: string }) => {
    const { pipeline: p } = await pipeline();
    const { snapshot } = await p.revise(section, options.feedback, { signal: abort.signal });
    log(`✓ ${section} v${snapshot.versionNumber}: ${snapshot.wordCount} words`, colors.green);
  });

program
  .command('revise-all')
  .description('Revise every drafted section with the same feedback')
  .requiredOption('-f, --feedback <text>', 'Feedback to address')
  .option('--skip <sections>', 'Comma-separated sections to leave alone')
  .option('--concurrency <n>', 'Sections revised at once', '2')
  .action(async (options: { feedback: string; skip?: string; concurrency: string }) => {
    const { pipeline: p } = await pipeline();
    const outcomes = await p.reviseAll(options.feedback, {
      skip: parseList(options.skip),
      concurrency: parsePositive(options.concurrency, 'Concurrency'),
      signal: abort.signal,
    });
    outcomes.forEach(printOutcome);
    if (outcomes.some(o => o.status === 'failed')) {
      process.exitCode = 1;
    }
  });

program
  .command('polish <section>')
  .description('Polish a section')
  .option('--focus <focus>', `One of ${POLISH_FOCI.join(', ')}`)
  .action(async (section: string, options: { focus?: string }) => {
    if (options.focus !== undefined && !isPolishFocus(options.focus)) {
      throw new ConfigurationError(`Unknown focus '${options.focus}' (expected ${POLISH_FOCI.join(', ')})`);
    }
    const focus = options.focus !== undefined && isPolishFocus(options.focus) ? options.focus : undefined;
    const { pipeline: p } = await pipeline();
    const { snapshot } = await p.polish(section, focus, { signal: abort.signal });
    log(`✓ ${section} v${snapshot.versionNumber}: ${snapshot.wordCount} words`, colors.green);
  });

program
  .command('review <section>')
  .description('Print a critique of the current version; records nothing')
  .action(async (section: string) => {
    const { project, config, ai } = await context();
    if (!ai) {
      throw new ConfigurationError('Review needs a model; run it without --no-ai');
    }
    const p = await project.createPipeline(createService(config, ai));
    const { versionNumber, review } = await p.review(section, { signal: abort.signal });
    log(`Review of ${section} v${versionNumber}\n`, colors.bright);
    console.log(review);
  });

program
  .command('import <section> <file>')
  .description('Record the contents of a file as a manual version of a section')
  .action(async (section: string, file: string) => {
    const { pipeline: p } = await pipeline();
    const { snapshot, citations } = await p.recordManual(
      section,
      await fs.read(path.resolve(file)),
      `Imported from ${path.basename(file)}`
    );
    log(`✓ ${section} v${snapshot.versionNumber}: ${snapshot.wordCount} words, ${snapshot.citationKeys.length} citations`, colors.green);
    if (citations.unresolved.length > 0) {
      log(`  Unresolved citations: ${citations.unresolved.join(', ')}`, colors.yellow);
    }
  });

program
  .command('revert <section> <version>')
  .description('Append a copy of an earlier version as the new current version')
  .action(async (section: string, version: string) => {
    const { project } = await context();
    const snapshot = await project.versions.revert(section, parseVersion(version));
    log(`✓ ${section} v${snapshot.versionNumber} (${snapshot.operationDetail ?? 'revert'})`, colors.green);
  });

// ============================================================================
// Inspection
// ============================================================================

program
  .command('sections')
  .description('List sections that have history, with their current version')
  .action(async () => {
    const { project } = await context();
    const sections = await project.versions.listSections();
    if (sections.length === 0) {
      log('No sections drafted yet', colors.dim);
      return;
    }
    for (const section of sections) {
      const current = await project.versions.get(section);
      log(`${section}  v${current.versionNumber}  ${current.operation}  ${current.wordCount} words`);
    }
  });

program
  .command('history <section>')
  .description('List every version of a section, oldest first')
  .action(async (section: string) => {
    const { project } = await context();
    for (const entry of await project.versions.history(section)) {
      const detail = entry.operationDetail ? ` - ${entry.operationDetail}` : '';
      log(`v${entry.versionNumber}  ${entry.createdAt}  ${entry.operation}  ${entry.wordCount} words${detail}`);
    }
  });

program
  .command('diff <section> <v1> <v2>')
  .description('Line diff between two versions')
  .action(async (section: string, v1: string, v2: string) => {
    const { project } = await context();
    const records = await project.versions.diff(section, parseVersion(v1), parseVersion(v2));
    if (records.length === 0) {
      log('No differences', colors.dim);
      return;
    }
    console.log(formatDiff(records));
  });

program
  .command('show <section>')
  .description('Print the current text with citations rendered')
  .option('--format <format>', `Citation format (${CITATION_FORMATS.join(', ')})`)
  .action(async (section: string, options: { format?: string }) => {
    const { config, pipeline: p } = await pipeline();
    console.log(await p.currentText(section, parseFormat(options.format, config.citations.format)));
  });

program
  .command('context <section>')
  .description('Print the context a draft would be assembled from')
  .option('--focus <terms>', 'Comma-separated focus terms')
  .action(async (section: string, options: { focus?: string }) => {
    const { pipeline: p } = await pipeline();
    const payload = await p.buildContext(section, { focusTerms: parseList(options.focus) });
    log(`Tokens: ${payload.totalTokens}/${payload.budget} (prompt frame ${payload.overheadTokens})`, colors.bright);
    for (const fragment of payload.includedFragments) {
      const note = fragment.truncated ? ' (truncated)' : '';
      log(`  ${fragment.citationKey}  ${fragment.sourceId}  ${fragment.tokenCost} tokens${note}`);
    }
    if (payload.excludedSourceIds.length > 0) {
      log(`  Excluded: ${payload.excludedSourceIds.join(', ')}`, colors.dim);
    }
  });

program
  .command('stats')
  .description('Word and citation totals')
  .action(async () => {
    const { pipeline: p } = await pipeline();
    const stats = await p.statistics();
    log(`Sections drafted:  ${stats.sectionsDrafted}`);
    log(`Total words:       ${stats.totalWords}`);
    log(`Total citations:   ${stats.totalCitations}`);
    log(`Avg words/section: ${stats.averageWordsPerSection}`);
  });

// ============================================================================
// Citations
// ============================================================================

const cite = program.command('cite').description('Manage the bibliography');

cite
  .command('add <key>')
  .description('Register or enrich a bibliography entry')
  .option('--title <title>', 'Title')
  .option('--authors <names>', 'Comma-separated authors')
  .option('--year <year>', 'Year')
  .option('--journal <journal>', 'Journal')
  .option('--doi <doi>', 'DOI')
  .action(async (key: string, options: { title?: string; authors?: string; year?: string; journal?: string; doi?: string }) => {
    const { project } = await context();
    const rawMetadata: Record<string, unknown> = {};
    if (options.journal) rawMetadata.journal = options.journal;
    if (options.doi) rawMetadata.doi = options.doi;

    const result = await project.citations.register(key, {
      title: options.title,
      authors: parseList(options.authors),
      year: options.year,
      rawMetadata,
    });

    if (result.created) {
      log(`✓ Registered ${result.entry.key}`, colors.green);
    } else if (result.enrichedFields.length > 0) {
      log(`✓ Enriched ${result.entry.key}: ${result.enrichedFields.join(', ')}`, colors.green);
    } else {
      log(`${result.entry.key} unchanged`, colors.dim);
    }
  });

cite
  .command('remove <key>')
  .description('Remove an entry no section cites')
  .action(async (key: string) => {
    const { project } = await context();
    const removed = await project.citations.remove(key);
    log(removed ? `✓ Removed ${key}` : `${key} is not registered`, removed ? colors.green : colors.yellow);
  });

cite
  .command('check')
  .description('Report unresolved keys and malformed markers per section')
  .action(async () => {
    const { pipeline: p } = await pipeline();
    const reports = await p.checkCitations();
    let problems = 0;
    for (const report of reports) {
      if (report.unresolved.length === 0 && report.malformed.length === 0) {
        log(`  ✓ ${report.sectionId} v${report.versionNumber}`, colors.green);
        continue;
      }
      problems++;
      if (report.warning) log(`  ! ${report.warning.message}`, colors.yellow);
      for (const raw of report.malformed) log(`  ! ${report.sectionId}: malformed marker ${raw}`, colors.yellow);
    }
    if (problems > 0) process.exitCode = 1;
  });

program
  .command('references')
  .description('Print the reference list')
  .option('--style <style>', 'apa or ieee')
  .action(async (options: { style?: string }) => {
    const { project, config } = await context();
    console.log(project.citations.formatBibliography(parseStyle(options.style, config.citations.bibliographyStyle)));
  });

program
  .command('bibtex')
  .description('Print the bibliography as BibTeX')
  .action(async () => {
    const { project } = await context();
    console.log(project.citations.exportBibtex());
  });

// ============================================================================
// Run
// ============================================================================

function handleError(error: unknown) {
  const failure = toManuscriptError(error);
  log(`\n❌ ${failure.message}`, colors.red);
  if (failure instanceof VersionNotFoundError && failure.available.length === 0) {
    log('   Draft the section first.', colors.yellow);
  }
  process.exitCode = 1;
}

program.parseAsync(process.argv).catch(handleError);
