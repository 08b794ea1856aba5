/**
 * Pipeline - draft, revise, polish and revert sections
 *
 * Each operation: assemble context (drafts only) → generate → ingest
 * citations → append a snapshot. A failure leaves the section's history as
 * it was; other sections are never touched.
 */

import type { VersionStore } from '../version-store/VersionStore';
import type { SectionSnapshot, SnapshotOperation } from '../version-store/types';
import type { SourceCorpus } from '../source-corpus/SourceCorpus';
import type { SourceDocument } from '../source-corpus/types';
import type { CitationResolver } from '../citation-resolver/CitationResolver';
import type { CitationFormat, IngestResult } from '../citation-resolver/types';
import type { ContextAssembler } from '../context-assembler/ContextAssembler';
import type { ContextPayload } from '../context-assembler/types';
import type { GenerativeService } from '../generative/types';
import { UnresolvedCitationWarning, toManuscriptError } from '../errors';
import { createLogger } from '../logger';
import { findSection, flattenSections, objectiveFor, type Outline } from './outline';
import { polishFeedback, sectionDrafting, sectionReview, sectionRevision, type PolishFocus } from './prompts';

const log = createLogger('Pipeline');

export interface PipelineDependencies {
  versions: VersionStore;
  corpus: SourceCorpus;
  citations: CitationResolver;
  assembler: ContextAssembler;
  service: GenerativeService;
  outline: Outline;
}

export interface PipelineConfig {
  maxContextTokens: number;
  /** Per generative call */
  timeoutMs?: number;
  maxOutputTokens?: number;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

export interface DraftOptions extends OperationOptions {
  /** Added to the outline's guidance for this section */
  guidance?: string;
  focusTerms?: string[];
}

export interface SectionResult {
  snapshot: SectionSnapshot;
  citations: IngestResult;
}

export interface SectionReview {
  sectionId: string;
  versionNumber: number;
  review: string;
  model: string;
}

export type ReviseAllStatus = 'revised' | 'skipped' | 'failed';

export interface ReviseAllOutcome {
  sectionId: string;
  status: ReviseAllStatus;
  snapshot?: SectionSnapshot;
  error?: string;
}

export interface ReviseAllOptions extends OperationOptions {
  skip?: string[];
  concurrency?: number;
}

export interface PipelineStatistics {
  sectionsDrafted: number;
  totalWords: number;
  totalCitations: number;
  averageWordsPerSection: number;
}

export interface CitationReport {
  sectionId: string;
  versionNumber: number;
  unresolved: string[];
  malformed: string[];
  warning?: UnresolvedCitationWarning;
}

export class Pipeline {
  constructor(
    private deps: PipelineDependencies,
    private config: PipelineConfig
  ) {}

  /**
   * Context a draft of this section would be built from. The drafting
   * prompt's system text and frame count against the same budget.
   */
  async buildContext(sectionId: string, options: Omit<DraftOptions, 'signal'> = {}): Promise<ContextPayload> {
    const section = findSection(this.deps.outline, sectionId);
    const corpus = await this.sourcesFor(section.sources);

    const guidance = [section.guidance, options.guidance].filter(Boolean).join('\n\n');
    const frame = sectionDrafting(section, '');

    return this.deps.assembler.assemble({
      objective: objectiveFor(section),
      guidance,
      corpus,
      maxTokens: this.config.maxContextTokens,
      focusTerms: options.focusTerms,
      overheadTokens: this.deps.assembler.estimate(frame.system) + this.deps.assembler.estimate(frame.user),
    });
  }

  async draft(sectionId: string, options: DraftOptions = {}): Promise<SectionResult> {
    const section = findSection(this.deps.outline, sectionId);
    const context = await this.buildContext(sectionId, options);
    const prompt = sectionDrafting(section, this.deps.assembler.renderPrompt(context));

    log.info(`Drafting ${sectionId} (${context.includedFragments.length} source(s), ${context.totalTokens} tokens)`);

    const result = await this.deps.service.generate({
      prompt: prompt.user,
      system: prompt.system,
      context,
      signal: options.signal,
      timeoutMs: this.config.timeoutMs,
      maxTokens: this.config.maxOutputTokens,
    });

    return this.record(sectionId, result.text, 'draft', `Drafted with ${result.model}`);
  }

  async revise(sectionId: string, feedback: string, options: OperationOptions = {}): Promise<SectionResult> {
    const current = await this.deps.versions.get(sectionId);
    const history = await this.deps.versions.history(sectionId);
    const iteration = history.filter(h => h.operation === 'revise').length + 1;

    const prompt = sectionRevision(current.content, feedback, iteration);
    log.info(`Revising ${sectionId} v${current.versionNumber} (revision ${iteration})`);

    const result = await this.deps.service.generate({
      prompt: prompt.user,
      system: prompt.system,
      baseContent: current.content,
      signal: options.signal,
      timeoutMs: this.config.timeoutMs,
      maxTokens: this.config.maxOutputTokens,
    });

    return this.record(sectionId, result.text, 'revise', feedback);
  }

  async polish(sectionId: string, focus?: PolishFocus, options: OperationOptions = {}): Promise<SectionResult> {
    const current = await this.deps.versions.get(sectionId);
    const prompt = sectionRevision(current.content, polishFeedback(focus), 1);

    log.info(`Polishing ${sectionId} v${current.versionNumber}${focus ? ` (${focus})` : ''}`);

    const result = await this.deps.service.generate({
      prompt: prompt.user,
      system: prompt.system,
      baseContent: current.content,
      signal: options.signal,
      timeoutMs: this.config.timeoutMs,
      maxTokens: this.config.maxOutputTokens,
    });

    return this.record(sectionId, result.text, 'polish', focus ? `focus: ${focus}` : 'general');
  }

  /**
   * Record author-supplied text as a 'manual' version. Citations are
   * canonicalized and registered as for generated text.
   */
  recordManual(sectionId: string, content: string, detail?: string): Promise<SectionResult> {
    return this.record(sectionId, content, 'manual', detail);
  }

  /**
   * Critique of the current text; records nothing
   */
  async review(sectionId: string, options: OperationOptions = {}): Promise<SectionReview> {
    const current = await this.deps.versions.get(sectionId);
    const title = flattenSections(this.deps.outline).find(s => s.id === sectionId)?.title ?? sectionId;
    const prompt = sectionReview(title, current.content);

    log.info(`Reviewing ${sectionId} v${current.versionNumber}`);

    const result = await this.deps.service.generate({
      prompt: prompt.user,
      system: prompt.system,
      signal: options.signal,
      timeoutMs: this.config.timeoutMs,
      maxTokens: this.config.maxOutputTokens,
    });

    return { sectionId, versionNumber: current.versionNumber, review: result.text.trim(), model: result.model };
  }

  revert(sectionId: string, targetVersion: number): Promise<SectionSnapshot> {
    return this.deps.versions.revert(sectionId, targetVersion);
  }

  /**
   * Revise every drafted section with shared feedback, in batches of
   * `concurrency`. One section failing does not stop the others.
   */
  async reviseAll(feedback: string, options: ReviseAllOptions = {}): Promise<ReviseAllOutcome[]> {
    const skip = new Set(options.skip ?? []);
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 2));
    const sectionIds = await this.draftedSections();

    const outcomes: ReviseAllOutcome[] = [];
    const pending: string[] = [];

    for (const sectionId of sectionIds) {
      if (skip.has(sectionId)) {
        outcomes.push({ sectionId, status: 'skipped' });
      } else {
        pending.push(sectionId);
      }
    }

    const batches: string[][] = [];
    for (let i = 0; i < pending.length; i += concurrency) {
      batches.push(pending.slice(i, i + concurrency));
    }

    for (const batch of batches) {
      const results = await Promise.all(
        batch.map(async (sectionId): Promise<ReviseAllOutcome> => {
          try {
            const { snapshot } = await this.revise(sectionId, feedback, { signal: options.signal });
            return { sectionId, status: 'revised', snapshot };
          } catch (error) {
            const failure = toManuscriptError(error);
            log.error(`Revision of ${sectionId} failed: ${failure.message}`);
            return { sectionId, status: 'failed', error: failure.message };
          }
        })
      );
      outcomes.push(...results);
    }

    const order = new Map(sectionIds.map((id, i) => [id, i]));
    return outcomes.sort((a, b) => (order.get(a.sectionId) ?? 0) - (order.get(b.sectionId) ?? 0));
  }

  /**
   * Current text with citations rendered
   */
  async currentText(sectionId: string, format: CitationFormat): Promise<string> {
    const snapshot = await this.deps.versions.get(sectionId);
    return this.deps.citations.render(snapshot.content, format);
  }

  async statistics(): Promise<PipelineStatistics> {
    const sectionIds = await this.deps.versions.listSections();
    let totalWords = 0;
    let totalCitations = 0;

    for (const sectionId of sectionIds) {
      const snapshot = await this.deps.versions.get(sectionId);
      totalWords += snapshot.wordCount;
      totalCitations += snapshot.citationKeys.length;
    }

    return {
      sectionsDrafted: sectionIds.length,
      totalWords,
      totalCitations,
      averageWordsPerSection: sectionIds.length > 0 ? Math.round(totalWords / sectionIds.length) : 0,
    };
  }

  async checkCitations(): Promise<CitationReport[]> {
    const reports: CitationReport[] = [];

    for (const sectionId of await this.draftedSections()) {
      const snapshot = await this.deps.versions.get(sectionId);
      const unresolved = Array.from(this.deps.citations.unresolved(snapshot.citationKeys)).sort();
      const malformed = this.deps.citations.findMalformedMarkers(snapshot.content).map(m => m.raw);

      const report: CitationReport = { sectionId, versionNumber: snapshot.versionNumber, unresolved, malformed };
      if (unresolved.length > 0) {
        report.warning = new UnresolvedCitationWarning(unresolved, sectionId);
      }
      reports.push(report);
    }

    return reports;
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private async record(
    sectionId: string,
    text: string,
    operation: Exclude<SnapshotOperation, 'revert'>,
    detail?: string
  ): Promise<SectionResult> {
    const corpus = await this.deps.corpus.snapshot();
    const citations = await this.deps.citations.ingest(text, corpus);
    const snapshot = await this.deps.versions.append(sectionId, citations.text, operation, detail);

    log.info(
      `${sectionId} v${snapshot.versionNumber}: ${snapshot.wordCount} words, ${snapshot.citationKeys.length} citation(s)`
    );
    return { snapshot, citations };
  }

  private async sourcesFor(ids?: string[]): Promise<SourceDocument[]> {
    const all = await this.deps.corpus.snapshot();
    if (!ids || ids.length === 0) return all;

    const wanted = new Set(ids);
    return all.filter(doc => wanted.has(doc.id));
  }

  /**
   * Sections with history: outline order first, then the rest sorted
   */
  private async draftedSections(): Promise<string[]> {
    const present = new Set(await this.deps.versions.listSections());
    const ordered = flattenSections(this.deps.outline)
      .map(s => s.id)
      .filter(id => present.has(id));
    const rest = Array.from(present)
      .filter(id => !ordered.includes(id))
      .sort();
    return [...ordered, ...rest];
  }
}
