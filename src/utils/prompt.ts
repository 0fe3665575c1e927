import { confirm, input, select } from "@inquirer/prompts";
import chalk from "chalk";
import { PromptType } from "../types/enums.js";
import { logger } from "./logger.js";

type CleanupFn = () => Promise<void> | void;

type PromptChoice<T> = {
  name: string;
  value: T;
  description?: string;
  disabled?: boolean | string;
};

type BasePromptOptions = {
  message: string;
  cleanup?: CleanupFn;
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
  pageSize?: number;
};

export type PromptOptions<T> =
  | InputPromptOptions
  | ConfirmPromptOptions
  | SelectPromptOptions<T>;

function isExitPromptError(error: unknown): boolean {
  return error instanceof Error && error.name === "ExitPromptError";
}

async function handlePromptExit(cleanup?: CleanupFn): Promise<never> {
  logger.info(chalk.yellow("\n\n⚠ Prompt cancelled by user (Ctrl+C)"));
  logger.info(chalk.gray("Cleaning up resources..."));
  if (cleanup) {
    await cleanup();
  }
  logger.info(chalk.gray("Exiting..."));
  process.exit(130);
}

function ask<T>(options: PromptOptions<T>): Promise<string | boolean | T> {
  switch (options.type) {
    case PromptType.Input:
      return input({
        message: options.message,
        default: options.default,
        validate: options.validate,
      });
    case PromptType.Confirm:
      return confirm({
        message: options.message,
        default: options.default,
      });
    case PromptType.Select:
      return select({
        message: options.message,
        choices: options.choices,
        default: options.default,
        pageSize: options.pageSize,
      });
  }
}

export function prompt(options: InputPromptOptions): Promise<string>;
export function prompt(options: ConfirmPromptOptions): Promise<boolean>;
export function prompt<T>(options: SelectPromptOptions<T>): Promise<T>;
export async function prompt<T>(
  options: PromptOptions<T>,
): Promise<string | boolean | T> {
  try {
    return await ask(options);
  } catch (error) {
    if (isExitPromptError(error)) {
      await handlePromptExit(options.cleanup);
    }
    throw error;
  }
}
