import type { IngestionConfig } from '@medgraph/schemas/src/app-config.schema.js';
import type { Corpus, CorpusPaper } from '@medgraph/schemas/src/corpus.schema.js';
import { readJsonFile } from '@medgraph/schemas/src/config-loader.js';
import { validateCorpus } from '@medgraph/schemas/src/validators.js';
import type { DocumentInput, ImportSummary } from '@medgraph/shared/src/types/ingestion.types.js';
import { createChildLogger } from '@medgraph/shared/src/logger.js';
import { isScopeTerminatingError, toError } from '@medgraph/shared/src/utils/errors.js';
import { throwIfCancelled } from '@medgraph/shared/src/utils/cancellation.js';
import type { GraphStore } from '@medgraph/core/src/graph/graph-store.js';

const log = createChildLogger('ingestion:literature');

const UNKNOWN_JOURNAL = 'Unknown Journal';
const UNKNOWN_YEAR = 'Unknown Year';
const YEAR_PATTERN = /^\s*\d{1,4}\s*$/;

export interface CorpusImporterDeps {
  readonly graphStore: GraphStore;
}

export interface ImportOptions {
  readonly clear?: boolean;
  readonly signal?: AbortSignal;
}

export interface CorpusImporter {
  importCorpus(corpus: Corpus, options?: ImportOptions): Promise<ImportSummary>;
  importFile(filePath: string, options?: ImportOptions): Promise<ImportSummary>;
}

type LengthLimits = Pick<IngestionConfig, 'minTextLength' | 'maxTextLength'>;

function buildHeader(paper: CorpusPaper): string {
  return (
    `Title: ${paper.paper_title ?? ''}\n` +
    `Authors: ${paper.paper_authors ?? ''}\n` +
    `Journal: ${paper.paper_journal ?? ''}\n` +
    `Year: ${paper.paper_year ?? ''}\n` +
    `Abstract: ${paper.paper_abstract ?? ''}\n\n`
  );
}

function selectFullText(fullText: string | undefined, limits: LengthLimits): string {
  if (fullText === undefined || fullText.length < limits.minTextLength) return '';
  return fullText.slice(0, limits.maxTextLength);
}

export function referenceTimeFor(year: string | undefined, now: () => Date = () => new Date()): Date {
  if (year === undefined || !YEAR_PATTERN.test(year)) return now();
  const value = Number(year);
  if (value < 1) return now();
  // Date.UTC maps 0-99 onto 1900-1999
  const date = new Date(Date.UTC(2000, 0, 1));
  date.setUTCFullYear(value);
  return date;
}

export function buildDocument(paperId: string, paper: CorpusPaper, limits: LengthLimits): DocumentInput {
  return {
    name: paper.paper_title ?? paperId,
    content: buildHeader(paper) + selectFullText(paper.paper_full_text, limits),
    sourceDescription: `${paper.paper_journal ?? UNKNOWN_JOURNAL}, ${paper.paper_year ?? UNKNOWN_YEAR}`,
    referenceTime: referenceTimeFor(paper.paper_year),
  };
}

export function createCorpusImporter(deps: CorpusImporterDeps, config: LengthLimits): CorpusImporter {
  const { graphStore } = deps;

  async function importCorpus(corpus: Corpus, options: ImportOptions = {}): Promise<ImportSummary> {
    if (options.clear) {
      log.info('Clearing graph before import');
      await graphStore.clear();
    }

    const papers = Object.entries(corpus);
    log.info({ papers: papers.length }, 'Importing literature corpus');

    let imported = 0;
    let failed = 0;
    for (const [paperId, paper] of papers) {
      throwIfCancelled(options.signal);
      try {
        await graphStore.upsertDocument(buildDocument(paperId, paper, config));
        imported++;
        log.debug({ paperId }, 'Imported paper');
      } catch (error) {
        if (isScopeTerminatingError(error)) throw error;
        failed++;
        log.warn({ paperId, err: toError(error) }, 'Failed to import paper');
      }
    }

    log.info({ imported, failed }, 'Corpus import finished');
    return { imported, failed };
  }

  return {
    importCorpus,

    async importFile(filePath: string, options?: ImportOptions): Promise<ImportSummary> {
      const corpus = validateCorpus(await readJsonFile(filePath));
      return importCorpus(corpus, options);
    },
  };
}
