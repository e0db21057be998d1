/**
 * Agent tools: knowledgebase retrieval and ingestion, web search and
 * workflow triggering. Optional integrations are registered only when
 * configured.
 */

import { z } from "zod";
import type { Knowledgebase } from "../knowledgebase";
import { formatSearchResults, googleSearch, type GoogleSearchConfig } from "../services/googleSearch";
import type { WorkflowClient } from "../services/workflowClient";
import { defineTool, type AgentTool } from "./tool";

export interface AgentToolDeps {
  knowledgebase: Knowledgebase;
  defaultNamespace: string;
  google?: GoogleSearchConfig;
  workflows?: WorkflowClient;
}

export function createAgentTools(deps: AgentToolDeps): AgentTool[] {
  const namespace = z
    .string()
    .min(1)
    .optional()
    .describe(`Knowledgebase namespace (defaults to "${deps.defaultNamespace}")`);

  const tools: AgentTool[] = [
    defineTool({
      name: "query_knowledgebase",
      description: "Search the knowledgebase for passages relevant to a question. Use this before answering product or documentation questions.",
      parameters: z.object({
        query: z.string().min(1).describe("Natural-language search query"),
        namespace,
      }),
      execute: ({ query, namespace: ns }) => deps.knowledgebase.query(query, ns ?? deps.defaultNamespace),
    }),

    defineTool({
      name: "add_sitemap_to_knowledgebase",
      description: "Fetch every page listed in a sitemap.xml and add it to the knowledgebase.",
      parameters: z.object({
        sitemap_url: z.string().url().describe("URL of a sitemap.xml"),
        namespace,
      }),
      execute: async ({ sitemap_url, namespace: ns }) => {
        const summary = await deps.knowledgebase.addSitemap(sitemap_url, ns ?? deps.defaultNamespace);
        return `Added ${summary.documents} pages (${summary.chunks} chunks) from ${sitemap_url}.`;
      },
    }),

    defineTool({
      name: "add_github_repo_to_knowledgebase",
      description: "Add the documentation files (markdown, rst, txt) of a GitHub repository to the knowledgebase.",
      parameters: z.object({
        repository: z.string().min(1).describe('"owner/repo" or a github.com URL'),
        namespace,
      }),
      execute: async ({ repository, namespace: ns }) => {
        const summary = await deps.knowledgebase.addGithubRepo(repository, ns ?? deps.defaultNamespace);
        return `Added ${summary.documents} files (${summary.chunks} chunks) from ${repository}.`;
      },
    }),
  ];

  const google = deps.google;
  if (google) {
    tools.push(
      defineTool({
        name: "google_search",
        description: "Search the web. Use for recent or external information the knowledgebase does not cover.",
        parameters: z.object({
          query: z.string().min(1),
          num_results: z.number().int().min(1).max(10).optional(),
        }),
        execute: async ({ query, num_results }) =>
          formatSearchResults(await googleSearch(query, google, { numResults: num_results })),
      }),
    );
  }

  const workflows = deps.workflows;
  if (workflows) {
    tools.push(
      defineTool({
        name: "trigger_workflow_deployment",
        description: "Start a run of a workflow deployment. Only do this when the user explicitly asks for it.",
        parameters: z.object({
          deployment: z.string().min(1).describe('"<flow-name>/<deployment-name>"'),
          parameters: z.record(z.unknown()).optional().describe("Run parameters"),
        }),
        execute: async ({ deployment, parameters }) => {
          const run = await workflows.triggerDeployment(deployment, parameters ?? {});
          return `Started run "${run.name}" (id ${run.id}) of ${deployment}.`;
        },
      }),
    );
  }

  return tools;
}
