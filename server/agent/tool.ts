import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { ValidationError } from "../utils/errorHandler";

/**
 * A capability the agent can call. `run` receives the model's decoded JSON
 * arguments and validates them before executing.
 */
export interface AgentTool {
  name: string;
  description: string;
  parameters: z.ZodTypeAny;
  run(rawArgs: unknown): Promise<string>;
}

export interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: S;
  execute(args: z.output<S>): Promise<string>;
}

export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): AgentTool {
  return {
    name: definition.name,
    description: definition.description,
    parameters: definition.parameters,
    async run(rawArgs: unknown): Promise<string> {
      const parsed = definition.parameters.safeParse(rawArgs);
      if (!parsed.success) {
        throw new ValidationError(
          `Invalid arguments for ${definition.name}: ${fromZodError(parsed.error).message}`,
        );
      }
      return definition.execute(parsed.data);
    },
  };
}
