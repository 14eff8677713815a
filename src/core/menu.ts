import { toRepoCleanerError } from "../errors.js";
import {
  deleteBranches,
  getProjectDetails,
  getRepositoryDetails,
  listBranches,
} from "./branch-operations.js";
import type { CleanerContext } from "./cleaner-context.js";
import { loadProtectedBranches } from "./protected-branches.js";
import { saveBranches } from "./snapshot-writer.js";

export enum MenuCommand {
  SetFilename = "0",
  SetProjectKey = "1",
  SetRepositorySlug = "2",
  ProjectDetails = "3",
  RepositoryDetails = "4",
  ListBranches = "5",
  SaveBranches = "6",
  ShowProtectedBranches = "7",
  DeleteBranches = "8",
}

const MENU_LABELS: Record<MenuCommand, string> = {
  [MenuCommand.SetFilename]: "Set filename",
  [MenuCommand.SetProjectKey]: "Set project key",
  [MenuCommand.SetRepositorySlug]: "Set repository slug",
  [MenuCommand.ProjectDetails]: "Get project details",
  [MenuCommand.RepositoryDetails]: "Get repository details",
  [MenuCommand.ListBranches]: "Get branches",
  [MenuCommand.SaveBranches]: "Save branches",
  [MenuCommand.ShowProtectedBranches]: "Show not allowed branches",
  [MenuCommand.DeleteBranches]: "Delete branches",
};

const COMMANDS: readonly MenuCommand[] = Object.values(MenuCommand);

export const MENU_PROMPT = `${COMMANDS.map((command) => `\n${command}. ${MENU_LABELS[command]}`).join("")}\nEnter your preference: `;

export const GOODBYE = "Thanks for using me - bye!";

export type MenuHandler = (context: CleanerContext) => Promise<void>;
export type MenuHandlers = Record<MenuCommand, MenuHandler>;

/** How the loop ended. */
export type MenuExit = "quit" | "input-closed" | "error";

/** Maps trimmed operator input to a command; anything else is null. */
export function parseMenuChoice(input: string): MenuCommand | null {
  const choice = input.trim();
  return COMMANDS.find((command) => command === choice) ?? null;
}

async function askTrimmed(context: CleanerContext, question: string): Promise<string> {
  return ((await context.prompter.ask(question)) ?? "").trim();
}

export const defaultMenuHandlers: MenuHandlers = {
  [MenuCommand.SetFilename]: async (context) => {
    context.protectedBranchesFile = await askTrimmed(
      context,
      "Please enter filename (i.e., not-allowed-branches): ",
    );
    context.prompter.print(`File ${context.protectedBranchesFile} is set.`);
  },
  [MenuCommand.SetProjectKey]: async (context) => {
    context.projectKey = await askTrimmed(context, "Please enter project key (i.e., ISPJ): ");
    context.prompter.print(`Project key ${context.projectKey} is set.`);
  },
  [MenuCommand.SetRepositorySlug]: async (context) => {
    context.repositorySlug = await askTrimmed(
      context,
      "Please enter repository slug (i.e., prov-onends-adapter): ",
    );
    context.prompter.print(`Repository slug ${context.repositorySlug} is set.`);
  },
  [MenuCommand.ProjectDetails]: async (context) => {
    await getProjectDetails(context);
  },
  [MenuCommand.RepositoryDetails]: async (context) => {
    await getRepositoryDetails(context);
  },
  [MenuCommand.ListBranches]: async (context) => {
    for (const branch of await listBranches(context)) {
      context.prompter.print(branch.displayId);
    }
  },
  [MenuCommand.SaveBranches]: async (context) => {
    await saveBranches(context);
  },
  [MenuCommand.ShowProtectedBranches]: async (context) => {
    context.prompter.print(JSON.stringify(await loadProtectedBranches(context)));
  },
  [MenuCommand.DeleteBranches]: async (context) => {
    await deleteBranches(context);
  },
};

/**
 * Prompts for a choice and dispatches it until the operator enters anything
 * outside the menu or closes input. An error from an action ends the loop.
 */
export async function runMenu(
  context: CleanerContext,
  handlers: MenuHandlers = defaultMenuHandlers,
): Promise<MenuExit> {
  try {
    for (;;) {
      const answer = await context.prompter.ask(MENU_PROMPT);
      if (answer === null) {
        context.prompter.print(GOODBYE);
        return "input-closed";
      }

      const command = parseMenuChoice(answer);
      if (command === null) {
        context.logger.debug?.("Unrecognized menu choice, exiting", { choice: answer });
        context.prompter.print(GOODBYE);
        return "quit";
      }

      context.logger.debug?.("Menu choice", { command, action: MENU_LABELS[command] });
      await handlers[command](context);
    }
  } catch (err) {
    const error = toRepoCleanerError(err);
    context.prompter.print(`Unexpected exception: ${error.message}`);
    context.logger.error("Menu action failed", { code: error.code, error });
    return "error";
  }
}
