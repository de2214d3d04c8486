import type { Formatter } from "../../formatter.js";
import type { Backend } from "../../ui/backend.js";
import { isChar, type Key } from "../../ui/key.js";
import { type InvalidResult, runValidators, type Validator } from "../../validator.js";
import type { ActionResult, PromptCore, Submission } from "../prompt.js";
import { readSubmission } from "./temp-file.js";

export type EditorAction = { kind: "openEditor" };

export interface EditorPromptInit {
  message: string;
  file: string;
  editorName: string;
  /** Runs the editor on `file`; resolves once it has exited. */
  openEditor: (file: string) => Promise<void>;
  helpMessage: string | null;
  validators: readonly Validator<string>[];
  formatter: Formatter<string>;
}

export class EditorPrompt implements PromptCore<EditorAction, string> {
  readonly message: string;
  private error: InvalidResult | null = null;

  constructor(private readonly init: EditorPromptInit) {
    this.message = init.message;
  }

  mapKey(key: Key): EditorAction | null {
    return isChar(key, "e") ? { kind: "openEditor" } : null;
  }

  async handle(): Promise<ActionResult> {
    await this.init.openEditor(this.init.file);
    // the editor drew over our frame
    return "needsRedraw";
  }

  async submit(): Promise<Submission<string>> {
    const answer = readSubmission(this.init.file);
    const validation = await runValidators(this.init.validators, answer);
    if (validation.kind === "invalid") {
      this.error = validation;
      return null;
    }
    return { answer };
  }

  formatAnswer(answer: string): string {
    return this.init.formatter(answer);
  }

  render(backend: Backend): void {
    if (this.error) {
      backend.renderErrorMessage(this.error.message);
    }

    backend.renderEditorPrompt(this.message, this.init.editorName);

    if (this.init.helpMessage) {
      backend.renderHelpMessage(this.init.helpMessage);
    }
  }
}
