/**
 * Pipeline Module
 */

export {
  Pipeline,
  type CitationReport,
  type DraftOptions,
  type OperationOptions,
  type PipelineConfig,
  type PipelineDependencies,
  type PipelineStatistics,
  type ReviseAllOptions,
  type ReviseAllOutcome,
  type ReviseAllStatus,
  type SectionResult,
  type SectionReview,
} from './Pipeline';
export {
  EMPTY_OUTLINE,
  findSection,
  flattenSections,
  loadOutline,
  objectiveFor,
  outlineSchema,
  parseOutline,
  saveOutline,
  type Outline,
  type OutlineSection,
} from './outline';
export {
  GENERAL_POLISH_FEEDBACK,
  POLISH_FOCI,
  isPolishFocus,
  polishFeedback,
  sectionDrafting,
  sectionReview,
  sectionRevision,
  type PolishFocus,
  type PromptPair,
} from './prompts';
