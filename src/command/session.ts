/**
 * Command session for the Center Body dialog.
 *
 * The host calls the session's handlers from its single-threaded event
 * dispatch: `validateInputs` to gate the OK button, `preview` on every
 * preview tick, and `execute` once the user confirms. Each call snapshots the
 * dialog state into a fresh job; nothing carries over between calls.
 */

import type { CenterTarget, MovePlan, NoticeLevel } from "../core/types.js";
import type { TraceContext } from "../core/trace.js";
import { CommandSessionError, HostOperationError } from "../core/errors.js";
import {
  DEFAULT_PIPELINE_CONFIG,
  runCenterBodyPipeline,
  type PipelineConfig,
  type PipelineResult
} from "../pipelines/centerBody.js";
import { dialogStateToJob, validateDialogInputs, visiblePairInputs, type DialogState } from "./dialog.js";

export const COMMAND_NAME = "Center Body";

/**
 * What the session needs from the host application.
 */
export interface CenterCommandHost {
  /** Show a message to the user. Never called during preview. */
  notify(level: NoticeLevel, title: string, message: string): void;
  /** Apply a planned move. Returning false reports a failed move. */
  applyMove(plan: MovePlan, target: CenterTarget): boolean;
}

export interface CenterCommandSessionOptions {
  config?: PipelineConfig;
  tracer?: TraceContext;
}

export type InvocationKind = "preview" | "execute";

export interface InvocationOutcome {
  kind: InvocationKind;
  /** Undefined when the dialog has no target selected. */
  pipeline?: PipelineResult;
  applied: boolean;
}

export interface CommandHandlers {
  validateInputs(state: DialogState): boolean;
  inputChanged(state: DialogState): number[];
  preview(state: DialogState): InvocationOutcome;
  execute(state: DialogState): InvocationOutcome;
  destroy(): void;
}

const TITLES: Record<NoticeLevel, string> = {
  info: `${COMMAND_NAME} - Info`,
  warning: `${COMMAND_NAME} - Warning`,
  error: `${COMMAND_NAME} - Error`,
};

export class CenterCommandSession {
  readonly handlers: CommandHandlers;

  private readonly host: CenterCommandHost;
  private readonly config: PipelineConfig;
  private readonly tracer?: TraceContext;
  private invocations = 0;
  private destroyed = false;

  constructor(host: CenterCommandHost, options: CenterCommandSessionOptions = {}) {
    this.host = host;
    this.config = options.config ?? DEFAULT_PIPELINE_CONFIG;
    this.tracer = options.tracer;

    this.handlers = {
      validateInputs: (state) => validateDialogInputs(state),
      inputChanged: (state) => visiblePairInputs(state),
      preview: (state) => this.run(state, "preview"),
      execute: (state) => this.run(state, "execute"),
      destroy: () => {
        this.destroyed = true;
      },
    };
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  preview(state: DialogState): InvocationOutcome {
    return this.handlers.preview(state);
  }

  execute(state: DialogState): InvocationOutcome {
    return this.handlers.execute(state);
  }

  private run(state: DialogState, kind: InvocationKind): InvocationOutcome {
    if (this.destroyed) {
      throw new CommandSessionError(`${COMMAND_NAME} session was already destroyed`, COMMAND_NAME);
    }
    if (!state.target) {
      return { kind, applied: false };
    }

    const notify = (level: NoticeLevel, message: string) => {
      if (kind === "execute") this.host.notify(level, TITLES[level], message);
    };

    this.invocations += 1;
    const job = dialogStateToJob(state, state.target, `${kind}-${this.invocations}`);
    const pipeline = runCenterBodyPipeline(job, this.config, { tracer: this.tracer });

    for (const notice of pipeline.notices) {
      notify(notice.level, notice.message);
    }
    for (const warning of pipeline.result?.warnings ?? []) {
      notify("warning", warning.message);
    }
    if (pipeline.result?.status === "already_centered") {
      notify("info", "Target is already centered (or very close).");
    }

    if (!pipeline.move) {
      return { kind, pipeline, applied: false };
    }

    let applied: boolean;
    try {
      applied = this.host.applyMove(pipeline.move, state.target);
    } catch (err) {
      throw new HostOperationError(
        `Failed to apply ${pipeline.move.feature_name}`,
        pipeline.move.kind,
        err
      );
    }

    if (!applied) {
      notify("error", "Failed to move target.");
    }
    return { kind, pipeline, applied };
  }
}
