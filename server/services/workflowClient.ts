/**
 * Workflow Engine Client
 *
 * Triggers deployments on a Prefect-compatible orchestration API. Scheduling,
 * retries and run state belong to the engine; this client only starts runs.
 */

import { z } from "zod";
import { TIMEOUT_CONSTANTS } from "../config/constants";
import { ExternalServiceError, ValidationError } from "../utils/errorHandler";
import { logInfo } from "../utils/logger";
import type { FetchLike } from "../knowledgebase/chromaClient";

export interface WorkflowClientConfig {
  apiUrl: string;
  apiKey?: string;
}

export interface TriggeredRun {
  id: string;
  name: string;
  deploymentId: string;
}

const deploymentSchema = z.object({ id: z.string() });
const flowRunSchema = z.object({ id: z.string(), name: z.string() });

/**
 * "flow-name/deployment-name" → both parts; anything else is rejected.
 */
export function parseDeploymentName(fullName: string): { flow: string; deployment: string } {
  const parts = fullName.split("/").map((part) => part.trim());
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ValidationError(`Deployment must be "<flow>/<deployment>", got "${fullName}"`);
  }
  return { flow: parts[0], deployment: parts[1] };
}

export class WorkflowClient {
  private readonly apiUrl: string;
  private readonly apiKey?: string;
  private readonly fetchImpl: FetchLike;

  constructor(config: WorkflowClientConfig, fetchImpl: FetchLike = fetch) {
    this.apiUrl = config.apiUrl.replace(/\/$/, "");
    this.apiKey = config.apiKey;
    this.fetchImpl = fetchImpl;
  }

  async triggerDeployment(fullName: string, parameters: Record<string, unknown> = {}): Promise<TriggeredRun> {
    const { flow, deployment } = parseDeploymentName(fullName);
    const found = deploymentSchema.parse(
      await this.request("GET", `/deployments/name/${encodeURIComponent(flow)}/${encodeURIComponent(deployment)}`),
    );
    const run = flowRunSchema.parse(
      await this.request("POST", `/deployments/${found.id}/create_flow_run`, { parameters }),
    );

    logInfo(`[Workflow] Triggered ${fullName} as run ${run.name}`, { runId: run.id });
    return { id: run.id, name: run.name, deploymentId: found.id };
  }

  private async request(method: "GET" | "POST", pathname: string, payload?: unknown): Promise<unknown> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const response = await this.fetchImpl(`${this.apiUrl}${pathname}`, {
      method,
      headers,
      body: payload === undefined ? undefined : JSON.stringify(payload),
      signal: AbortSignal.timeout(TIMEOUT_CONSTANTS.TOOL_HTTP_TIMEOUT_MS),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new ExternalServiceError("Workflow API", `${method} ${pathname} failed: ${response.status} ${errorText}`, response.status);
    }
    return response.json();
  }
}
