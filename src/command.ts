/**
 * Command construction for a resolved request.
 *
 * The provider's template is expanded into an argument vector and the prompt
 * is appended as the last argument, unmodified. Nothing here produces a
 * shell line: the display rendering is for humans only.
 */

import { InvalidPromptError } from './errors.js';
import type { ResolvedRequest } from './request.js';
import type { TemplateArg } from './providers/types.js';

/** Longest prompt accepted, in UTF-16 code units. */
export const MAX_PROMPT_LENGTH = 32_000;

/**
 * An executable plus its argument tokens.
 *
 * buildCommand validates the prompt before creating one; `create` does no
 * validation of its own. The tokens are handed to the process runner as a
 * vector and are never joined into a string.
 */
export class CommandSpec {
  readonly executable: string;
  readonly args: readonly string[];

  private constructor(executable: string, args: readonly string[]) {
    this.executable = executable;
    this.args = Object.freeze([...args]);
    Object.freeze(this);
  }

  static create(executable: string, args: readonly string[]): CommandSpec {
    return new CommandSpec(executable, args);
  }
}

export interface BuiltCommand {
  spec: CommandSpec;
  /** Shell-style rendering for --verbose and --dry-run output. */
  display: string;
  /** Shown when the executable is missing. */
  installHint: string;
}

/** Instruction bounding the answer length. Advisory only. */
export function conciseInstruction(maxWords: number): string {
  return `Answer concisely in under ${maxWords} words.`;
}

export function validatePrompt(prompt: string): void {
  if (prompt.trim() === '') {
    throw new InvalidPromptError('The question is empty.');
  }
  if (prompt.length > MAX_PROMPT_LENGTH) {
    throw new InvalidPromptError(
      `The question is too long (${prompt.length} characters, maximum ${MAX_PROMPT_LENGTH}).`,
    );
  }
  if (prompt.includes('\0')) {
    throw new InvalidPromptError('The question contains a NUL character.');
  }
}

const SAFE_TOKEN = /^[\w@%+=:,./-]+$/;

/** Quote a token for display the way a POSIX shell would read it back. */
export function quoteForDisplay(token: string): string {
  if (SAFE_TOKEN.test(token)) return token;
  return `'${token.replace(/'/g, '\'\\\'\'')}'`;
}

/**
 * Build the command for a resolved request.
 *
 * @throws InvalidPromptError for an empty, oversized or NUL-containing prompt.
 */
export function buildCommand(request: ResolvedRequest): BuiltCommand {
  validatePrompt(request.prompt);

  const { command } = request.provider;
  const instruction = conciseInstruction(request.maxResponseWords);
  const fill = (arg: TemplateArg): string => {
    if (typeof arg === 'string') return arg;
    return arg.slot === 'model' ? request.model : instruction;
  };

  const spec = CommandSpec.create(command.executable, [
    ...command.args.map(fill),
    request.prompt,
  ]);
  const display = [spec.executable, ...spec.args].map(quoteForDisplay).join(' ');

  return { spec, display, installHint: request.provider.installHint };
}
