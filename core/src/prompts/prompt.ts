/**
 * The read-render-handle loop shared by every prompt.
 *
 * Each prompt is a state machine behind the `PromptCore` interface. The loop
 * draws a frame whenever the last step asked for one, reads a key, maps it
 * to Submit / Cancel / Interrupt or to a prompt-specific action, and feeds
 * that back into the core until an answer is accepted.
 */

import { OperationCanceledError, OperationInterruptedError } from "../errors.js";
import type { InputActionResult } from "../input/action.js";
import type { PromptIO } from "../terminal/terminal.js";
import { Backend } from "../ui/backend.js";
import { FrameRenderer } from "../ui/frame-renderer.js";
import type { Key } from "../ui/key.js";
import type { RenderConfig } from "../ui/render-config.js";

// --- Action results ---------------------------------------------------------

export type ActionResult = "clean" | "needsRedraw";

export function mergeResults(a: ActionResult, b: ActionResult): ActionResult {
  return a === "needsRedraw" || b === "needsRedraw" ? "needsRedraw" : "clean";
}

export function fromInputResult(result: InputActionResult): ActionResult {
  return result === "clean" ? "clean" : "needsRedraw";
}

/** Turns a "did anything change" flag into an action result. */
export function redrawIf(changed: boolean): ActionResult {
  return changed ? "needsRedraw" : "clean";
}

// --- Actions ----------------------------------------------------------------

export type PromptAction<Inner> =
  | { kind: "submit" }
  | { kind: "cancel" }
  | { kind: "interrupt" }
  | { kind: "inner"; action: Inner };

export type KeyMapper<Inner> = (key: Key) => Inner | null;

/** Submit, Cancel and Interrupt are fixed; every other key goes to the prompt's mapper. */
export function actionFromKey<Inner>(key: Key, mapInner: KeyMapper<Inner>): PromptAction<Inner> | null {
  switch (key.kind) {
    case "cancel":
    case "escape":
      return { kind: "cancel" };
    case "interrupt":
      return { kind: "interrupt" };
    case "submit":
    case "enter":
      return { kind: "submit" };
    default: {
      const action = mapInner(key);
      return action === null ? null : { kind: "inner", action };
    }
  }
}

// --- Prompt core ------------------------------------------------------------

/** Null keeps the prompt open; the core is expected to have set an error to show. */
export type Submission<Output> = { answer: Output } | null;

export interface PromptCore<Inner, Output> {
  readonly message: string;

  mapKey(key: Key): Inner | null;

  /** Runs once before the first frame. */
  setup?(): void | Promise<void>;

  /** Returns false to keep the prompt open instead of cancelling. */
  preCancel?(): boolean | Promise<boolean>;

  handle(action: Inner): ActionResult | Promise<ActionResult>;

  submit(): Submission<Output> | Promise<Submission<Output>>;

  render(backend: Backend): void;

  formatAnswer(answer: Output): string;
}

// --- Loop -------------------------------------------------------------------

export async function runPrompt<Inner, Output>(
  core: PromptCore<Inner, Output>,
  io: PromptIO,
  renderConfig: RenderConfig,
): Promise<Output> {
  const renderer = new FrameRenderer(io.terminal);
  const backend = new Backend(renderer, renderConfig);

  try {
    await core.setup?.();

    let last: ActionResult = "needsRedraw";
    for (;;) {
      if (last === "needsRedraw") {
        backend.frameSetup();
        core.render(backend);
        backend.frameFinish();
        last = "clean";
      }

      const key = await io.reader.readKey();
      const action = actionFromKey(key, (k) => core.mapKey(k));
      if (!action) continue;

      switch (action.kind) {
        case "submit": {
          const submission = await core.submit();
          if (submission) {
            backend.frameSetup();
            backend.renderPromptWithAnswer(core.message, core.formatAnswer(submission.answer));
            backend.frameFinish();
            return submission.answer;
          }
          last = "needsRedraw";
          break;
        }
        case "cancel": {
          const proceed = core.preCancel ? await core.preCancel() : true;
          if (proceed) {
            backend.frameSetup();
            backend.renderCanceledPrompt(core.message);
            backend.frameFinish();
            throw new OperationCanceledError();
          }
          last = "needsRedraw";
          break;
        }
        case "interrupt":
          throw new OperationInterruptedError();
        case "inner":
          last = await core.handle(action.action);
          break;
      }
    }
  } finally {
    try {
      renderer.close();
    } finally {
      io.close?.();
    }
  }
}
