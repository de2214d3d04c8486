/**
 * Glyphs and style sheets consumed by the prompt renderer.
 *
 * Two presets exist: `emptyRenderConfig()` emits no colour sequences at all,
 * `defaultColoredRenderConfig()` is what prompts use unless the environment
 * asks for no colour (see config/global.ts).
 */

import { type StyleSheet, type Styled, styleSheet, styled } from "./style.js";

/** How option indices are printed before each option in list prompts. */
export type IndexPrefix = "none" | "simple" | "spacePadded" | "zeroPadded";

export interface ErrorMessageRenderConfig {
  prefix: Styled;
  separator: StyleSheet;
  message: StyleSheet;
  defaultMessage: string;
}

export interface CalendarRenderConfig {
  prefix: Styled;
  header: StyleSheet;
  weekHeader: StyleSheet;
  /** When null, the native terminal cursor marks the selected day instead. */
  selectedDate: StyleSheet | null;
  todayDate: StyleSheet;
  differentMonthDate: StyleSheet;
  unavailableDate: StyleSheet;
}

export interface RenderConfig {
  promptPrefix: Styled;
  answeredPromptPrefix: Styled;
  prompt: StyleSheet;
  defaultValue: StyleSheet;
  placeholder: StyleSheet;
  helpMessage: StyleSheet;
  textInput: StyleSheet;
  errorMessage: ErrorMessageRenderConfig;
  passwordMask: string;
  answer: StyleSheet;
  canceledPromptIndicator: Styled;
  highlightedOptionPrefix: Styled;
  scrollUpPrefix: Styled;
  scrollDownPrefix: Styled;
  selectedCheckbox: Styled;
  unselectedCheckbox: Styled;
  optionIndexPrefix: IndexPrefix;
  option: StyleSheet;
  /** Applied to the option under the cursor; null keeps `option`. */
  selectedOption: StyleSheet | null;
  calendar: CalendarRenderConfig;
  editorPrompt: StyleSheet;
}

const plain = styleSheet();

export function emptyRenderConfig(): RenderConfig {
  return {
    promptPrefix: styled("?"),
    answeredPromptPrefix: styled("?"),
    prompt: plain,
    defaultValue: plain,
    placeholder: plain,
    helpMessage: plain,
    textInput: plain,
    errorMessage: {
      prefix: styled("#"),
      separator: plain,
      message: plain,
      defaultMessage: "Invalid input.",
    },
    passwordMask: "*",
    answer: plain,
    canceledPromptIndicator: styled("<canceled>"),
    highlightedOptionPrefix: styled(">"),
    scrollUpPrefix: styled("^"),
    scrollDownPrefix: styled("v"),
    selectedCheckbox: styled("[x]"),
    unselectedCheckbox: styled("[ ]"),
    optionIndexPrefix: "none",
    option: plain,
    selectedOption: null,
    calendar: {
      prefix: styled(">"),
      header: plain,
      weekHeader: plain,
      selectedDate: null,
      todayDate: plain,
      differentMonthDate: plain,
      unavailableDate: plain,
    },
    editorPrompt: plain,
  };
}

export function defaultColoredRenderConfig(): RenderConfig {
  return {
    ...emptyRenderConfig(),
    promptPrefix: styled("?", styleSheet({ fg: "lightGreen" })),
    answeredPromptPrefix: styled(">", styleSheet({ fg: "lightGreen" })),
    placeholder: styleSheet({ fg: "darkGrey" }),
    helpMessage: styleSheet({ fg: "lightCyan" }),
    errorMessage: {
      prefix: styled("#", styleSheet({ fg: "lightRed" })),
      separator: plain,
      message: styleSheet({ fg: "lightRed" }),
      defaultMessage: "Invalid input.",
    },
    answer: styleSheet({ fg: "lightCyan" }),
    canceledPromptIndicator: styled("<canceled>", styleSheet({ fg: "darkRed" })),
    highlightedOptionPrefix: styled(">", styleSheet({ fg: "lightCyan" })),
    selectedCheckbox: styled("[x]", styleSheet({ fg: "lightGreen" })),
    selectedOption: styleSheet({ fg: "lightCyan" }),
    calendar: {
      prefix: styled(">", styleSheet({ fg: "lightGreen" })),
      header: plain,
      weekHeader: plain,
      selectedDate: styleSheet({ fg: "black", bg: "grey" }),
      todayDate: styleSheet({ fg: "lightGreen" }),
      differentMonthDate: styleSheet({ fg: "darkGrey" }),
      unavailableDate: styleSheet({ fg: "darkGrey" }),
    },
    editorPrompt: styleSheet({ fg: "darkCyan" }),
  };
}
