import type { Formatter } from "../../formatter.js";
import type { PromptIO } from "../../terminal/terminal.js";
import type { Validator } from "../../validator.js";
import { type CommonPromptOptions, PromptBase } from "../base.js";
import { runPrompt } from "../prompt.js";
import { defaultEditorCommand, editorName, launchEditor } from "./launcher.js";
import { EditorPrompt } from "./prompt.js";
import { createTempFile, removeTempFile } from "./temp-file.js";

export const DEFAULT_FILE_EXTENSION = ".txt";

export const defaultEditorFormatter: Formatter<string> = () => "<received>";

export interface EditorOptions extends CommonPromptOptions {
  /** Defaults to $EDITOR, then $VISUAL, then nano (notepad on Windows). */
  editorCommand?: string;
  /** Passed before the file path. */
  editorArgs?: readonly string[];
  fileExtension?: string;
  /** Initial content of the file. */
  predefinedText?: string;
  validators?: readonly Validator<string>[];
  formatter?: Formatter<string>;
}

/**
 * Multi-line answer written in an external editor.
 *
 * The text lives in a temporary file that is removed when the prompt ends,
 * whatever the outcome.
 */
export class Editor extends PromptBase<string> {
  constructor(
    message: string,
    private readonly config: EditorOptions = {},
  ) {
    super(message, config);
  }

  protected createRunner(): (io: PromptIO) => Promise<string> {
    const { config } = this;
    const command = config.editorCommand ?? defaultEditorCommand();
    const args = config.editorArgs ?? [];

    return async (io) => {
      let file: string;
      try {
        file = createTempFile(
          config.fileExtension ?? DEFAULT_FILE_EXTENSION,
          config.predefinedText ?? "",
        );
      } catch (err) {
        io.close?.();
        throw err;
      }

      const core = new EditorPrompt({
        message: this.message,
        file,
        editorName: editorName(command),
        openEditor: async (path) => {
          io.reader.pause?.();
          try {
            await launchEditor(command, args, path);
          } finally {
            io.reader.resume?.();
          }
        },
        helpMessage: config.helpMessage ?? null,
        validators: config.validators ?? [],
        formatter: config.formatter ?? defaultEditorFormatter,
      });

      try {
        return await runPrompt(core, io, this.renderConfig);
      } finally {
        removeTempFile(file);
      }
    };
  }
}
