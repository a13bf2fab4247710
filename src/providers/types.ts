/** Placeholder filled in by the command builder. */
export interface TemplateSlot {
  slot: 'model' | 'instruction';
}

/** A fixed argument or a slot. */
export type TemplateArg = string | TemplateSlot;

/**
 * How a provider's CLI is invoked.
 *
 * The prompt is never part of the template: the builder always appends it
 * as the final argument, after `args`.
 */
export interface CommandTemplate {
  executable: string;
  args: readonly TemplateArg[];
}

export interface Provider {
  /** Unique lowercase key used on the command line and in the config file. */
  key: string;
  displayName: string;
  /** Canonical model identifiers, in display order. */
  models: readonly string[];
  /** Member of `models`. */
  defaultModel: string;
  /** Lowercase alias → canonical model identifier. */
  aliases: ReadonlyMap<string, string>;
  command: CommandTemplate;
  /** Declared but not yet supported providers are unavailable. */
  available: boolean;
  /** Shown when the executable is missing. */
  installHint: string;
}
