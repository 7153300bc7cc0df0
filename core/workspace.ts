// core/workspace.ts

import * as fs from "fs";
import * as readline from "readline/promises";

export const WORKSPACE_DIR = ".tdl";

/** Confirm: asks a yes/no question; resolves true to proceed. */
export type Confirm = (question: string) => Promise<boolean>;

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

export async function initWorkspace(dir: string = WORKSPACE_DIR): Promise<"created" | "exists"> {
  if (await isDirectory(dir)) {
    return "exists";
  }
  await fs.promises.mkdir(dir, { recursive: true });
  return "created";
}

/**
 * destroyWorkspace(dir, confirm):
 *   Removes `dir` recursively once `confirm` agrees. Nothing is touched when
 *   the directory is missing or the answer is no.
 */
export async function destroyWorkspace(
  dir: string,
  confirm: Confirm
): Promise<"destroyed" | "missing" | "aborted"> {
  if (!(await isDirectory(dir))) {
    return "missing";
  }
  if (!(await confirm(`Are you sure you want to destroy '${dir}'? (y/N): `))) {
    return "aborted";
  }
  await fs.promises.rm(dir, { recursive: true, force: true });
  return "destroyed";
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

/** Confirm implementation reading one answer from stdin. */
export const promptConfirm: Confirm = async (question) => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return isAffirmative(await rl.question(question));
  } finally {
    rl.close();
  }
};
