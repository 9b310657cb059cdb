#!/usr/bin/env node
/**
 * drift-lab CLI - run sweeps and inspect stored results
 */

import 'dotenv/config';
import type { AppConfig } from './config.js';
import { loadConfig, validateConfig, hasAIProvider } from './config.js';
import { initDatabase } from './storage/database.js';
import { SentenceCorpus } from './services/sentences.js';
import { createExperimentRunner } from './services/experiment-service.js';
import { analyzeTrials } from './engine/analysis/trial-analysis.js';
import { ConfigurationError, ValidationError, errorMessage } from './engine/errors.js';
import { USAGE, parseCliArgs, type CliCommand } from './cli-args.js';
import { formatAnalysis, formatPercent } from './analysis-report.js';

async function runExperiment(
  config: AppConfig,
  command: Extract<CliCommand, { name: 'experiment' }>
): Promise<number> {
  const experiment = {
    ...config.experiment,
    agents: command.agents ?? config.experiment.agents,
    errorRates: command.ratesPercent?.map((rate) => rate / 100) ?? config.experiment.errorRates,
    seed: command.seed ?? config.experiment.seed,
    chainAttempts: command.chainAttempts ?? config.experiment.chainAttempts,
  };
  const effective: AppConfig = { ...config, experiment };

  const store = await initDatabase(config.storage.dataDir);
  const corpus = await SentenceCorpus.fromFile(config.storage.sentencesFile);
  const sentences = corpus.getSentences(command.sentences ?? config.storage.sentenceCount);
  const runner = createExperimentRunner(effective, store);

  if (!hasAIProvider(config)) {
    console.log('⚠️  No OPENAI_API_KEY: offline mode (echo agent, hashing embeddings)');
  }

  const controller = new AbortController();
  const onSigint = (): void => {
    console.log('\n⏹️  Cancelling after the current trial...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const summary = await runner.runSweep(sentences, experiment.errorRates, experiment.agents, {
      signal: controller.signal,
    });

    console.log(`
📊 Sweep summary
   Trials:     ${summary.total}
   Succeeded:  ${summary.succeeded}
   Failed:     ${summary.failed}
   Persisted:  ${summary.persisted}${summary.persistFailures > 0 ? ` (${summary.persistFailures} not persisted)` : ''}
   Cancelled:  ${summary.cancelled ? 'yes' : 'no'}
   Duration:   ${(summary.duration / 1000).toFixed(1)}s
`);
    return 0;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

async function showStats(config: AppConfig): Promise<number> {
  const store = await initDatabase(config.storage.dataDir);
  const stats = await store.getStatistics();

  console.log(`
📊 Stored trials: ${stats.totalTrials} (${stats.successful} succeeded, ${stats.failed} failed)
   Sentences: ${stats.totalSentences}
   Error rates: ${stats.errorRates.map(formatPercent).join(', ') || '-'}`);
  for (const [agent, count] of Object.entries(stats.trialsByAgent)) {
    console.log(`   ${agent}: ${count}`);
  }
  return 0;
}

async function showAnalysis(
  config: AppConfig,
  command: Extract<CliCommand, { name: 'analyze' }>
): Promise<number> {
  const store = await initDatabase(config.storage.dataDir);
  const analysis = analyzeTrials(await store.readAll(), command.metric);

  console.log(`\n${formatAnalysis(analysis).join('\n')}`);
  return 0;
}

async function showSentences(
  config: AppConfig,
  command: Extract<CliCommand, { name: 'sentences' }>
): Promise<number> {
  const corpus = await SentenceCorpus.fromFile(config.storage.sentencesFile);
  corpus.getSentences().forEach((sentence, index) => {
    console.log(`${String(index + 1).padStart(3)}. ${sentence}`);
  });

  const stats = corpus.getStatistics();
  console.log(
    `\n📚 ${stats.totalSentences} sentences, ${stats.wordCount.min}-${stats.wordCount.max} words (avg ${stats.wordCount.avg.toFixed(1)})`
  );

  if (command.save) {
    await corpus.saveToFile(command.save);
    console.log(`💾 Saved to ${command.save}`);
  }
  return 0;
}

async function main(argv: string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}\n`);
    console.error(USAGE);
    return 1;
  }

  if (command.name === 'help') {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig();
  const validation = validateConfig(config);
  if (!validation.valid) {
    for (const error of validation.errors) {
      console.error(`⚠️  Config: ${error}`);
    }
    return 1;
  }

  try {
    switch (command.name) {
      case 'experiment':
        return await runExperiment(config, command);
      case 'stats':
        return await showStats(config);
      case 'analyze':
        return await showAnalysis(config, command);
      case 'sentences':
        return await showSentences(config, command);
    }
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof ValidationError) {
      console.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
