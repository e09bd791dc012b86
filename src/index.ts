/**
 * Entry point for the curriculum assembler.
 *
 * Loads the configured discipline profile and, when CURRICULUM_INPUT names
 * a record collection, assembles it and prints a summary. Nothing is
 * written to disk apart from optional log files.
 */

import {
  config,
  validateConfig,
  configuredLogLevel,
  ConfigError,
  DisciplineProfileError,
  loadBuiltinProfile,
} from "./config/index.js";
import { initRunId, createLogger } from "./logging/index.js";
import { RecordCollectionError, loadTopicRecordsFromFile } from "./records/index.js";
import { CurriculumAssembler } from "./pipeline/index.js";
import { createCurriculumDocument, createRunMetadata, summarizeCurriculum } from "./output/index.js";

function main(): void {
  const runId = initRunId();

  const logger = createLogger({
    level: configuredLogLevel(),
    component: config.appName,
    ...(config.logDir !== undefined ? { logDir: config.logDir } : {}),
  });

  try {
    validateConfig();

    logger.info("Application starting", { runId });
    logger.info("Configuration loaded", {
      env: config.env,
      debug: config.debug,
      logLevel: config.logLevel,
      discipline: config.discipline,
      target: config.targetSubtopics,
    });

    const profile = loadBuiltinProfile(config.discipline);
    logger.info("Discipline profile loaded", {
      discipline: profile.discipline,
      contentAreas: profile.contentAreas.length,
    });

    if (config.inputPath === undefined) {
      logger.info("CURRICULUM_INPUT not set; nothing to assemble");
      return;
    }

    const loaded = loadTopicRecordsFromFile(config.inputPath, { logger: logger.child("records") });
    const assembler = new CurriculumAssembler({ profile, target: config.targetSubtopics, logger });
    if (loaded.discipline !== undefined && loaded.discipline !== profile.discipline) {
      logger.warn("Record collection names a different discipline", {
        collection: loaded.discipline,
        profile: profile.discipline,
      });
    }
    const assembly = assembler.assembleLoaded(loaded);

    for (const warning of assembly.warnings) {
      logger.warn(warning.message, { stage: warning.stage, kind: warning.kind });
    }

    const doc = createCurriculumDocument(
      assembly,
      createRunMetadata({ runId, context: { input: config.inputPath } })
    );
    console.log(summarizeCurriculum(doc));
  } catch (err) {
    if (
      err instanceof ConfigError ||
      err instanceof DisciplineProfileError ||
      err instanceof RecordCollectionError
    ) {
      logger.error("Configuration error", {
        message: err instanceof ConfigError ? err.message : err.format(),
      });
      process.exit(1);
    }
    throw err;
  }
}

main();
