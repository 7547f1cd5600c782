#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { loadSettings, PIPELINE_VERSION } from './config.js';
import { ManifestCaptureSource, StaticCaptureSource, type CaptureSource } from './capture.js';
import { errorCode, errorMessage, PhasePreconditionError } from './errors.js';
import { formatComparison, formatRunStatus } from './formatting.js';
import { backgroundRuns, isRunning, launchRun } from './jobs.js';
import { buildEvaluationPrompt } from './prompt.js';
import { computeMaxPossible } from './rubric.js';
import { RunOrchestrator } from './run-orchestrator.js';
import { RunRegistry } from './storage/run-registry.js';
import { RunStore } from './storage/run-store.js';

const settings = loadSettings(process.env);
const store = new RunStore(settings.runsDir);
const registry = new RunRegistry(settings.runsDir);
const orchestrator = new RunOrchestrator({ settings, store, registry });

// Create the MCP server
const server = new McpServer({
  name: 'restyle-eval-mcp',
  version: PIPELINE_VERSION,
});

const PairInputSchema = z.object({
  originalImage: z.string().describe('Path to the original photo'),
  transformedImage: z.string().describe('Path to the transformed image'),
  task: z.string().describe('Style/task name, e.g. "Anime"'),
});

const RunConfigInput = z
  .record(z.string(), z.unknown())
  .describe(
    'Run configuration: { runId, tasks: string[], imagesPerTask, baselineRunId?, autoBaseline?, synthesis?: { technical, preference }, judges?: { technical?: { provider, model }, preference?: { provider, model } } }'
  );

function textResult(text: string, isError = false) {
  return {
    content: [{ type: 'text' as const, text }],
    ...(isError ? { isError: true } : {}),
  };
}

function jsonResult(value: unknown, isError = false) {
  return textResult(JSON.stringify(value, null, 2), isError);
}

function errorResult(error: unknown) {
  return jsonResult({ error: errorCode(error), message: errorMessage(error) }, true);
}

function captureSourceFor(
  manifestPath: string | undefined,
  pairs: Array<z.infer<typeof PairInputSchema>> | undefined
): CaptureSource | undefined {
  if (manifestPath) return new ManifestCaptureSource(manifestPath);
  if (pairs && pairs.length > 0) return new StaticCaptureSource(pairs);
  return undefined;
}

server.registerTool(
  'validate_run',
  {
    title: 'Validate Run Configuration',
    description: `Checks a run configuration without starting anything: schema, judge credentials, rubric store and output location.
Reports every failed check at once.`,
    inputSchema: {
      config: RunConfigInput,
    },
  },
  async ({ config }) => {
    try {
      const parsed = await orchestrator.validate(config);
      return jsonResult({ valid: true, config: parsed });
    } catch (error) {
      return errorResult(error);
    }
  }
);

server.registerTool(
  'start_run',
  {
    title: 'Start Evaluation Run',
    description: `Validates the configuration, creates the run and evaluates it in the background:
capture → evaluate → rank → synthesize → compare → persist.

Pairs come from a manifest file ({ "pairs": [{ originalImage, transformedImage, task }] }) or inline.
The number of pairs must equal tasks × imagesPerTask.

Returns the run id immediately. Poll check_run_status until the state is "persisted".`,
    inputSchema: {
      config: RunConfigInput,
      manifest_path: z.string().optional().describe('Path to a capture manifest JSON file'),
      pairs: z.array(PairInputSchema).optional().describe('Inline image pairs (alternative to manifest_path)'),
    },
  },
  async ({ config, manifest_path, pairs }) => {
    try {
      const source = captureSourceFor(manifest_path, pairs);
      if (!source) {
        throw new PhasePreconditionError('capture', 'provide manifest_path or pairs');
      }
      const validated = await orchestrator.validate(config);
      const record = await orchestrator.init(validated);
      launchRun(record.runId, () => orchestrator.runToCompletion(record, source));

      return jsonResult({
        run_id: record.runId,
        state: record.state,
        output_dir: record.outputDir,
        message: 'Run started. Poll check_run_status with this run_id.',
      });
    } catch (error) {
      return errorResult(error);
    }
  }
);

server.registerTool(
  'check_run_status',
  {
    title: 'Check Run Status',
    description: `Current state of a run, evaluation success/failure counts and failures.
Once the run is persisted, full=true returns the markdown report.`,
    inputSchema: {
      run_id: z.string().describe('The run_id given to start_run'),
      full: z.boolean().optional().describe('Return the full markdown report once the run is persisted'),
    },
  },
  async ({ run_id, full }) => {
    try {
      const record = await store.require(run_id);
      const background = backgroundRuns.get(run_id);
      const status = {
        ...formatRunStatus(record),
        ...(background ? { background: background.status, background_error: background.error ?? null } : {}),
      };

      if (full && record.state === 'persisted') {
        const report = await readFile(store.reportPath(run_id), 'utf-8');
        return textResult(`${report}\n---\n**Report saved to**: \`${store.reportPath(run_id)}\``);
      }
      return jsonResult(status);
    } catch (error) {
      return errorResult(error);
    }
  }
);

server.registerTool(
  'resume_run',
  {
    title: 'Resume Run',
    description: `Continues a run from its last valid state after a phase failed (e.g. the preference judge was unreachable).
A run stopped before capture needs manifest_path or pairs again.`,
    inputSchema: {
      run_id: z.string(),
      manifest_path: z.string().optional(),
      pairs: z.array(PairInputSchema).optional(),
    },
  },
  async ({ run_id, manifest_path, pairs }) => {
    try {
      if (isRunning(run_id)) {
        return jsonResult({ error: 'RUN_IN_PROGRESS', message: `Run "${run_id}" is still running` }, true);
      }
      const record = await store.require(run_id);
      if (record.state === 'persisted') {
        return jsonResult({ run_id, state: record.state, message: 'Run is already persisted' });
      }
      const source = captureSourceFor(manifest_path, pairs);
      launchRun(run_id, () => orchestrator.runToCompletion(record, source));
      return jsonResult({ run_id, resumed_from: record.state });
    } catch (error) {
      return errorResult(error);
    }
  }
);

server.registerTool(
  'compare_runs',
  {
    title: 'Compare Two Runs',
    description: `Per-task percentage diff between two persisted runs. Reads stored scores only; no judge calls.`,
    inputSchema: {
      run_id: z.string().describe('Current run'),
      baseline_run_id: z.string().describe('Baseline run'),
      epsilon: z.number().min(0).optional().describe('Deltas smaller than this count as unchanged (default from settings)'),
    },
  },
  async ({ run_id, baseline_run_id, epsilon }) => {
    try {
      const report = await orchestrator.compareStored(run_id, baseline_run_id, epsilon);
      return textResult(formatComparison(report));
    } catch (error) {
      return errorResult(error);
    }
  }
);

server.registerTool(
  'list_runs',
  {
    title: 'List Runs',
    description: 'Persisted runs, most recent first.',
    inputSchema: {
      limit: z.number().int().min(1).max(100).optional(),
    },
  },
  async ({ limit }) => textResult(registry.format(limit ?? 10))
);

server.registerTool(
  'get_rubric',
  {
    title: 'Show Rubric',
    description: `Shows the assertions, weights and maximum score used for a task, and the prompt the technical judge receives.
Unknown tasks resolve to the generic rubric.`,
    inputSchema: {
      task: z.string(),
      include_prompt: z.boolean().optional(),
    },
  },
  async ({ task, include_prompt }) => {
    try {
      const rubrics = await orchestrator.getRubrics();
      const rubric = rubrics.getRubric(task);
      return jsonResult({
        task: rubric.task,
        generic: rubric.generic,
        description: rubric.description,
        max_possible: computeMaxPossible(rubric),
        dimensions: rubric.dimensions,
        ...(include_prompt ? { prompt: buildEvaluationPrompt(rubric) } : {}),
        known_tasks: rubrics.tasks,
      });
    } catch (error) {
      return errorResult(error);
    }
  }
);

// Start the server
async function main() {
  console.error('[Restyle MCP] Starting server...');

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('[Restyle MCP] Server ready on stdio');
  console.error(`[Restyle MCP] Runs directory: ${store.runsDir}`);

  const shutdown = () => {
    const running = [...backgroundRuns.values()].filter(r => r.status === 'running').map(r => r.runId);
    if (running.length > 0) {
      console.error(`[Restyle MCP] Interrupted runs (resume with resume_run): ${running.join(', ')}`);
    }
    console.error('\n[Restyle MCP] Shutting down...');
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[Restyle MCP] Fatal error:', error);
  process.exit(1);
});

