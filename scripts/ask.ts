import { createInterface } from 'node:readline/promises';
import { loadAppConfig } from '@medgraph/schemas';
import {
  createAnswerPipeline,
  createContextAssembler,
  createTextLlmClient,
  formatAnswer,
  formatAnswerMetadata,
  openNeo4jGraphStore,
  runQuestionSession,
  withGraphStore,
} from '@medgraph/core';
import type { LinePrompter } from '@medgraph/core';
import { createConceptServices, describeConceptServices } from './concept-services.js';

function createConsolePrompter(): LinePrompter & { close(): void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const closed = new AbortController();
  rl.on('close', () => closed.abort());

  return {
    async ask(prompt: string): Promise<string | undefined> {
      if (closed.signal.aborted) return undefined;
      try {
        return await rl.question(prompt, { signal: closed.signal });
      } catch (error) {
        // Ctrl+C or end of input closes the interface and aborts the pending question
        if (closed.signal.aborted) return undefined;
        throw error;
      }
    },
    close() {
      rl.close();
    },
  };
}

async function main(): Promise<void> {
  const includeConcepts = !process.argv.includes('--no-concepts');
  const interactive = process.argv.includes('--interactive');
  const positionalArgs = process.argv.slice(2).filter((a) => !a.startsWith('--'));
  const question = positionalArgs[0] ?? 'What are the first-line treatments for hypertension?';

  const config = loadAppConfig();
  const services = await createConceptServices(config);

  console.log('=== Medical Question Answering ===\n');
  if (!interactive) {
    console.log(`Question: ${question}`);
  }
  for (const line of describeConceptServices(config, services)) {
    console.log(line);
  }
  console.log(`Include concepts: ${includeConcepts ? 'yes' : 'no'}`);
  console.log(`Mock LLM: ${process.env['MEDGRAPH_MOCK_LLM'] === 'true' ? 'yes' : 'no'}\n`);

  const startTime = Date.now();
  const textLlmClient = await createTextLlmClient(config.generation);

  await withGraphStore(
    () => openNeo4jGraphStore(config.graph),
    async (graphStore) => {
      const contextAssembler = createContextAssembler(
        { graphStore, ...services },
        {
          minConfidence: config.concepts.minConfidence,
          maxFacts: config.retrieval.maxFacts,
          maxEntities: config.retrieval.maxEntities,
        },
      );
      const pipeline = createAnswerPipeline({ contextAssembler, textLlmClient });

      if (interactive) {
        console.log("Type 'quit' or 'exit' to stop.\n");
        const prompter = createConsolePrompter();
        try {
          const summary = await runQuestionSession(
            { pipeline, prompter, write: (line) => console.log(line) },
            { includeConcepts },
          );
          console.log(
            `\n=== Session ended: ${String(summary.answered)} answered, ${String(summary.failed)} failed ===`,
          );
        } finally {
          prompter.close();
        }
        return;
      }

      const result = await pipeline.answer(question, { includeConcepts });
      for (const line of [...formatAnswer(result), '', ...formatAnswerMetadata(result)]) {
        console.log(line);
      }
      console.log(`\n=== Answered in ${String(Date.now() - startTime)}ms ===`);
    },
  );
}

main().catch((error: unknown) => {
  console.error('Question answering failed:', error);
  process.exit(1);
});
