/**
 * Interactive questions for values not supplied on the command line.
 */

import inquirer from "inquirer";

export interface IPromptFields {
  readonly goals: string;
  readonly returnFormat: string;
  readonly warnings: string;
}

export async function askPromptFields(
  known: { readonly returnFormat?: string | undefined; readonly warnings?: string | undefined },
  defaultFormat: string,
): Promise<IPromptFields> {
  const { goals } = await inquirer.prompt<{ goals: string }>([
    { type: "input", name: "goals", message: "Goals:", default: "Anonymous" },
  ]);

  const returnFormat =
    known.returnFormat ??
    (
      await inquirer.prompt<{ returnFormat: string }>([
        { type: "input", name: "returnFormat", message: "Return format:", default: defaultFormat },
      ])
    ).returnFormat;

  const warnings =
    known.warnings ??
    (
      await inquirer.prompt<{ warnings: string }>([
        { type: "input", name: "warnings", message: "Warnings:", default: "" },
      ])
    ).warnings;

  return { goals, returnFormat, warnings };
}

export async function askText(message: string, defaultValue?: string): Promise<string> {
  const { value } = await inquirer.prompt<{ value: string }>([
    {
      type: "input",
      name: "value",
      message,
      ...(defaultValue !== undefined ? { default: defaultValue } : {}),
    },
  ]);
  return value;
}

export async function askSecret(message: string): Promise<string> {
  const { value } = await inquirer.prompt<{ value: string }>([
    { type: "password", name: "value", message, mask: "*" },
  ]);
  return value;
}

export async function askChoice<T extends string>(
  message: string,
  choices: ReadonlyArray<{ readonly name: string; readonly value: T }>,
): Promise<T> {
  const { value } = await inquirer.prompt<{ value: T }>([
    { type: "list", name: "value", message, choices: [...choices] },
  ]);
  return value;
}

export async function askConfirm(message: string, defaultValue = true): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    { type: "confirm", name: "confirmed", message, default: defaultValue },
  ]);
  return confirmed;
}
