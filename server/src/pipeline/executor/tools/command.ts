/**
 * Command Wrapper
 *
 * Turns a zod schema and a typed run function into a tool-loop handler.
 * Bad arguments and unknown assumption ids come back to the model as
 * "Error: ..." strings without touching state; applied commands are
 * recorded on the context.
 */

import type { z } from "zod";
import { FactNotFoundError } from "../../../errors.js";
import { createComponentLogger } from "../../../logging.js";
import type { ToolHandler, ToolHandlerResult } from "../../../tool-loop/types.js";
import type { ExecutorContext } from "../context.js";

const log = createComponentLogger("executor.commands");

export interface CommandOutcome extends ToolHandlerResult {
  /** False when the command was valid but changed nothing. Defaults to true. */
  applied?: boolean;
}

export type CommandRun<S extends z.ZodTypeAny> = (ctx: ExecutorContext, input: z.output<S>) => string | CommandOutcome;

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

export function defineCommand<S extends z.ZodTypeAny>(name: string, schema: S, run: CommandRun<S>): ToolHandler<ExecutorContext> {
  return (ctx, args) => {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
      log.warn("Rejected command arguments", { tool: name, issues: parsed.error.issues.length });
      return `Error: invalid arguments for ${name}: ${formatIssues(parsed.error)}`;
    }

    let outcome: CommandOutcome;
    try {
      const raw = run(ctx, parsed.data);
      outcome = typeof raw === "string" ? { content: raw } : raw;
    } catch (err) {
      if (err instanceof FactNotFoundError) return `Error: ${err.message}`;
      throw err;
    }

    if (outcome.applied !== false) ctx.mutations.push({ tool: name, result: outcome.content });
    return { content: outcome.content, display: outcome.display };
  };
}
