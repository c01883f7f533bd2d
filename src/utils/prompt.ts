import { confirm, input, select } from "@inquirer/prompts";
import chalk from "chalk";
import { PromptType } from "../types/enums";
import { logger } from "./logger";

type PromptChoice<T> = {
  name: string;
  value: T;
  description?: string;
};

type BasePromptOptions = {
  message: string;
};

export type InputPromptOptions = BasePromptOptions & {
  type: PromptType.Input;
  default?: string;
  validate?: (value: string) => boolean | string;
};

export type ConfirmPromptOptions = BasePromptOptions & {
  type: PromptType.Confirm;
  default?: boolean;
};

export type SelectPromptOptions<T> = BasePromptOptions & {
  type: PromptType.Select;
  choices: PromptChoice<T>[];
  default?: T;
};

function isExitPromptError(error: unknown): boolean {
  return error instanceof Error && error.name === "ExitPromptError";
}

function handlePromptExit(): never {
  logger.info(chalk.yellow("\n\n⚠ Prompt cancelled by user (Ctrl+C)"));
  logger.info(chalk.gray("Exiting..."));
  process.exit(130);
}

/**
 * Run an interactive prompt; Ctrl+C exits with 130.
 */
export async function prompt(options: InputPromptOptions): Promise<string>;
export async function prompt(options: ConfirmPromptOptions): Promise<boolean>;
export async function prompt<T>(options: SelectPromptOptions<T>): Promise<T>;
export async function prompt<T>(
  options: InputPromptOptions | ConfirmPromptOptions | SelectPromptOptions<T>,
): Promise<string | boolean | T> {
  try {
    switch (options.type) {
      case PromptType.Input:
        return await input({
          message: options.message,
          default: options.default,
          validate: options.validate,
        });
      case PromptType.Confirm:
        return await confirm({
          message: options.message,
          default: options.default,
        });
      case PromptType.Select:
        return await select<T>({
          message: options.message,
          choices: options.choices,
          default: options.default,
        });
    }
  } catch (error) {
    if (isExitPromptError(error)) {
      return handlePromptExit();
    }
    throw error;
  }
}
