/** An answer from a list prompt: the chosen value and its index in the original options. */
export interface ListOption<T> {
  index: number;
  value: T;
}

export function listOption<T>(index: number, value: T): ListOption<T> {
  return { index, value };
}

/** An answer from the multi-count prompt: how many of an option were picked. */
export interface CountedListOption<T> {
  count: number;
  option: ListOption<T>;
}
