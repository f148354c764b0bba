import { sleep, throwIfAborted } from "../../lib/abort.js";
import { HealingExhaustedError, HealingHistoryEntry } from "../../lib/errors.js";
import { logInfo, logWarn } from "../../lib/logging.js";
import type { BuildArtifact, BuildAttempt, BuildMode, RepairRecord, RepairStrategy, Version } from "../../types.js";
import type { GenerationSession } from "../session.js";
import { FailureClassification, classifyBuildFailure } from "./failure-classifier.js";
import {
  ModelRepairer,
  addDependencies,
  modelRepair,
  regenerateFile,
  relaxTypeCheck,
  synthesizeTypes
} from "./repair-strategies.js";

export interface HealingLoopOptions {
  backoffMs: number;
  allowRelaxedTypeCheck: boolean;
}

export interface HealingOutcome {
  attempt: BuildAttempt;
  version: Version;
  /** Null when an earlier successful attempt was reused; load it from the repository instead. */
  artifact: BuildArtifact | null;
}

function toHistoryEntry(attempt: BuildAttempt): HealingHistoryEntry {
  return {
    attempt: attempt.attempt,
    category: attempt.category,
    strategy: attempt.strategy,
    repairSummary: attempt.repair?.summary ?? null,
    diagnostics: attempt.diagnostics
  };
}

/**
 * Build, classify, repair, rebuild. Bounded by the session's build budget,
 * which model-triggered builds share.
 */
export class HealingLoop {
  constructor(
    private readonly repairer: ModelRepairer,
    private readonly options: HealingLoopOptions
  ) {}

  async run(session: GenerationSession, mode: BuildMode): Promise<HealingOutcome> {
    let current = this.reusableAttempt(session);

    while (true) {
      throwIfAborted(session.signal);

      if (current?.outcome === "succeeded") {
        const version = session.project.versions.find((entry) => entry.id === current?.versionId);
        if (version) {
          return { attempt: current, version, artifact: null };
        }
      }

      if (!current || current.outcome !== "failed") {
        if (session.remainingBuilds <= 0) {
          throw this.exhausted(session);
        }

        const build = await session.build("healing", mode);
        if (build.attempt.outcome === "succeeded" && build.version) {
          logInfo("healing.attempt.succeeded", { projectId: session.project.id, attempt: build.attempt.attempt });
          return { attempt: build.attempt, version: build.version, artifact: build.artifact };
        }
        current = build.attempt;
      }

      const classification = classifyBuildFailure(current.diagnostics, {
        allowRelaxedTypeCheck: this.options.allowRelaxedTypeCheck
      });
      current.category = classification.category;

      logWarn("healing.attempt.failed", {
        projectId: session.project.id,
        attempt: current.attempt,
        category: classification.category,
        strategy: classification.strategy,
        diagnostics: current.diagnostics.length,
        remainingBuilds: session.remainingBuilds
      });

      if (session.remainingBuilds <= 0) {
        await session.persist();
        throw this.exhausted(session);
      }

      await sleep(this.options.backoffMs * current.attempt, session.signal);

      const { strategy, repair } = await this.repair(session, classification, current);
      current.strategy = strategy;
      current.repair = repair;
      await session.persist();

      logInfo("healing.repair.applied", {
        projectId: session.project.id,
        attempt: current.attempt,
        strategy,
        applied: repair.applied,
        changedPaths: repair.changedPaths
      });

      current = null;
    }
  }

  /** The latest session attempt, when it was made at the current file revision. */
  private reusableAttempt(session: GenerationSession): BuildAttempt | null {
    const latest = session.latestAttempt();
    if (!latest || latest.fileRevision !== session.store.revision || latest.repair) {
      return null;
    }
    return latest;
  }

  private async repair(
    session: GenerationSession,
    classification: FailureClassification,
    attempt: BuildAttempt
  ): Promise<{ strategy: RepairStrategy; repair: RepairRecord }> {
    switch (classification.strategy) {
      case "synthesize-types": {
        const repair = synthesizeTypes(session.store, classification);
        if (repair.applied || !this.options.allowRelaxedTypeCheck) {
          return { strategy: "synthesize-types", repair };
        }
        return { strategy: "relax-check", repair: relaxTypeCheck(session.store, classification) };
      }
      case "relax-check":
        return { strategy: "relax-check", repair: relaxTypeCheck(session.store, classification) };
      case "add-dependency":
        return { strategy: "add-dependency", repair: addDependencies(session.store, classification.packages) };
      case "regenerate-file":
        return {
          strategy: "regenerate-file",
          repair: await regenerateFile({
            store: session.store,
            repairer: this.repairer,
            classification,
            diagnostics: attempt.diagnostics
          })
        };
      case "model-repair":
        return {
          strategy: "model-repair",
          repair: await modelRepair({ store: session.store, repairer: this.repairer, diagnostics: attempt.diagnostics })
        };
    }
  }

  private exhausted(session: GenerationSession): HealingExhaustedError {
    return new HealingExhaustedError(session.maxBuildAttempts, session.attempts.map(toHistoryEntry));
  }
}
