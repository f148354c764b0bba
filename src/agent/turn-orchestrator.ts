import { randomUUID } from "node:crypto";
import { scopedSignal } from "../lib/abort.js";
import {
  ProtocolViolationError,
  SessionAbortedError,
  SessionBusyError,
  TurnLimitExceededError
} from "../lib/errors.js";
import { logInfo, logWarn } from "../lib/logging.js";
import type { ChatRole, ChatTurn, ChatTurnPurpose, ToolCall } from "../types.js";
import type { ModelRepairer, RepairTurnRequest } from "./correction/repair-strategies.js";
import { ToolConstraint, ToolExecutor } from "./executor.js";
import { REPAIR_SYSTEM_PROMPT, buildGenerationSystemPrompt } from "./prompts.js";
import type { GenerationSession } from "./session.js";
import type { ToolDescriptor, ToolRegistry } from "./tools/index.js";

export interface ModelToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ModelTurn {
  toolCalls: ModelToolCall[];
  commentary: string;
}

export interface ModelTurnRequest {
  systemPrompt: string;
  history: readonly ChatTurn[];
  tools: ToolDescriptor[];
  signal: AbortSignal;
}

/**
 * One model turn per call. Implementations throw ProtocolViolationError for
 * responses they cannot parse.
 */
export interface ModelClient {
  readonly id: string;
  requestTurn(request: ModelTurnRequest): Promise<ModelTurn>;
}

export interface TurnOrchestratorOptions {
  maxTurns: number;
  maxProtocolRetries: number;
  modelTimeoutMs: number;
}

export interface OrchestrationResult {
  summary: string;
  turns: number;
}

interface TurnExecution {
  finished: boolean;
  summary: string;
}

export class TurnOrchestrator {
  constructor(
    private readonly model: ModelClient,
    private readonly executor: ToolExecutor,
    private readonly tools: ToolRegistry,
    private readonly options: TurnOrchestratorOptions
  ) {}

  /**
   * Drives the model until it calls `finish`. Throws TurnLimitExceededError at
   * the ceiling and rethrows the last ProtocolViolationError once retries are spent.
   */
  async run(session: GenerationSession, instruction: string): Promise<OrchestrationResult> {
    this.appendTurn(session, { role: "user", purpose: "generation", commentary: instruction, status: "completed" });
    await session.persist();

    let agentTurns = 0;
    let violations = 0;

    while (true) {
      if (agentTurns >= this.options.maxTurns) {
        throw new TurnLimitExceededError(this.options.maxTurns);
      }

      agentTurns += 1;
      session.record.turnCount = agentTurns;

      const history = this.completedHistory(session);
      const turn = this.appendTurn(session, { role: "agent", purpose: "generation", commentary: "", status: "pending" });

      try {
        const reply = await this.requestTurn(session, {
          systemPrompt: buildGenerationSystemPrompt({
            projectName: session.project.name,
            files: session.store.digest(0),
            maxTurns: this.options.maxTurns
          }),
          history,
          tools: this.tools.describe()
        });
        violations = 0;

        const execution = await this.executeTurn(session, turn, reply);
        this.completeTurn(turn);
        await session.persist();

        logInfo("turn.completed", {
          projectId: session.project.id,
          turn: turn.index,
          toolCalls: turn.toolCalls.length,
          finished: execution.finished
        });

        if (execution.finished) {
          return { summary: execution.summary, turns: agentTurns };
        }
      } catch (error) {
        this.failTurn(turn, error);
        await session.persist();

        if (!(error instanceof ProtocolViolationError)) {
          throw error;
        }

        violations += 1;
        logWarn("turn.protocol_violation", {
          projectId: session.project.id,
          turn: turn.index,
          violations,
          message: error.message
        });

        if (violations > this.options.maxProtocolRetries) {
          throw error;
        }
      }
    }
  }

  /** Repair turns see only the repair instruction, never the generation history. */
  repairerFor(session: GenerationSession): ModelRepairer {
    return {
      runRepairTurn: (request) => this.runRepairTurn(session, request)
    };
  }

  private async runRepairTurn(session: GenerationSession, request: RepairTurnRequest): Promise<ToolCall[]> {
    const instructionTurn = this.appendTurn(session, {
      role: "tool",
      purpose: "repair",
      commentary: request.instruction,
      status: "completed"
    });

    for (let tries = 0; tries <= this.options.maxProtocolRetries; tries += 1) {
      const turn = this.appendTurn(session, { role: "agent", purpose: "repair", commentary: "", status: "pending" });

      try {
        const reply = await this.requestTurn(session, {
          systemPrompt: REPAIR_SYSTEM_PROMPT,
          history: [instructionTurn],
          tools: this.tools.describe(request.constraint.allowedTools)
        });

        await this.executeTurn(session, turn, reply, request.constraint);
        this.completeTurn(turn);
        await session.persist();
        return turn.toolCalls;
      } catch (error) {
        this.failTurn(turn, error);
        await session.persist();

        if (!(error instanceof ProtocolViolationError)) {
          throw error;
        }

        logWarn("turn.repair.protocol_violation", { projectId: session.project.id, turn: turn.index, message: error.message });
      }
    }

    return [];
  }

  private async requestTurn(
    session: GenerationSession,
    request: Omit<ModelTurnRequest, "signal">
  ): Promise<ModelTurn> {
    const scope = scopedSignal(session.signal, this.options.modelTimeoutMs);

    let reply: ModelTurn;
    try {
      reply = await this.model.requestTurn({ ...request, signal: scope.signal });
    } catch (error) {
      if (session.signal.aborted) {
        throw new SessionAbortedError();
      }
      if (scope.timedOut()) {
        throw new ProtocolViolationError(`Model turn timed out after ${this.options.modelTimeoutMs}ms.`);
      }
      throw error;
    } finally {
      scope.dispose();
    }

    if (!reply.toolCalls.length && !reply.commentary.trim()) {
      throw new ProtocolViolationError("Model turn contained neither tool calls nor commentary.");
    }

    return reply;
  }

  private async executeTurn(
    session: GenerationSession,
    turn: ChatTurn,
    reply: ModelTurn,
    constraint?: ToolConstraint
  ): Promise<TurnExecution> {
    turn.status = "executing";
    turn.commentary = reply.commentary;

    let finished = false;
    let summary = "";

    for (const call of reply.toolCalls) {
      if (finished) {
        turn.toolCalls.push(this.executor.skip(call, "Skipped: issued after finish."));
        continue;
      }

      const executed = await this.executor.execute(
        call,
        {
          store: session.store,
          signal: session.signal,
          runBuild: constraint ? undefined : (mode) => session.runModelBuild(mode)
        },
        constraint
      );
      turn.toolCalls.push(executed.call);

      if (executed.control?.type === "finish") {
        finished = true;
        summary = executed.control.summary;
      }
    }

    return { finished, summary };
  }

  private completedHistory(session: GenerationSession): ChatTurn[] {
    return session.project.turns.filter((turn) => turn.status === "completed" && turn.purpose === "generation");
  }

  private appendTurn(
    session: GenerationSession,
    input: { role: ChatRole; purpose: ChatTurnPurpose; commentary: string; status: ChatTurn["status"] }
  ): ChatTurn {
    if (input.status === "pending") {
      const open = session.project.turns.find((turn) => turn.status === "pending" || turn.status === "executing");
      if (open) {
        throw new SessionBusyError(session.project.id);
      }
    }

    const now = new Date().toISOString();
    const turn: ChatTurn = {
      id: randomUUID(),
      index: session.project.turns.length,
      role: input.role,
      purpose: input.purpose,
      status: input.status,
      commentary: input.commentary,
      toolCalls: [],
      errorMessage: null,
      startedAt: now,
      finishedAt: input.status === "completed" ? now : null
    };

    session.project.turns.push(turn);
    return turn;
  }

  private completeTurn(turn: ChatTurn): void {
    turn.status = "completed";
    turn.finishedAt = new Date().toISOString();
  }

  private failTurn(turn: ChatTurn, error: unknown): void {
    turn.status = "failed";
    turn.errorMessage = error instanceof Error ? error.message : String(error);
    turn.finishedAt = new Date().toISOString();
  }
}
