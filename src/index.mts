#!/usr/bin/env node
import { createServer } from 'node:http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ErrorCode,
  type CallToolRequest,
} from '@modelcontextprotocol/sdk/types.js';
import { assessMaterialityUpdates, createAnalysisDependencies, runMaterialityAnalysis } from './services/analysis.js';
import { GatewayNewsSource, type NewsSource } from './services/newsSource.js';
import { summarizeChanges } from './services/summaries.js';
import {
  AssessMaterialitySchema,
  MaterialityReportSchema,
  assessMaterialityInputJsonSchema,
  materialityReportJsonSchema,
  type AssessMaterialityInput,
} from './schemas/materiality.js';
import { parseDateNL, yearToDate } from './utils/date.js';
import { getConfig, assertRequiredConfig } from './config.js';
import { AnalysisError } from './errors.js';
import { logger } from './logger.js';
import type { DateRange, MaterialityReport } from './types.js';

const config = getConfig();
assertRequiredConfig(config);

const deps = createAnalysisDependencies(config);
let newsSource: NewsSource | undefined;

const server = new Server(
  {
    name: 'materiality-pulse',
    version: '0.1.0',
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

server.onerror = (error: Error) => logger.error({ err: error }, 'Unhandled MCP error');

process.on('SIGINT', () => {
  logger.info('SIGINT received, closing server');
  server.close().then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error({ err: error }, 'Failed to close server');
      process.exit(1);
    },
  );
});

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: [
    {
      name: 'assess_materiality',
      description:
        'Score news coverage against a company\'s existing materiality topics, detect priority changes, ' +
        'surface candidate new issues and recommend assessment updates. Articles may be supplied inline; ' +
        'otherwise they are fetched from the configured news gateway for the date range.',
      inputSchema: assessMaterialityInputJsonSchema,
      outputSchema: materialityReportJsonSchema,
    },
  ],
}));

server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
  try {
    switch (request.params.name) {
      case 'assess_materiality': {
        const parsed = AssessMaterialitySchema.safeParse(request.params.arguments ?? {});
        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          throw new McpError(
            ErrorCode.InvalidParams,
            `Invalid arguments: ${issue ? `${issue.path.join('.') || 'input'} ${issue.message}` : 'unreadable input'}`,
          );
        }

        const report = await runAssessment(parsed.data);
        const structured = MaterialityReportSchema.parse(report);

        return {
          content: [
            {
              type: 'text',
              text: formatReportSummary(report),
            },
          ],
          structuredContent: structured,
        };
      }
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${request.params.name}`);
    }
  } catch (error: unknown) {
    if (error instanceof McpError) {
      throw error;
    }
    if (error instanceof AnalysisError) {
      throw new McpError(error.code, error.message, error.details);
    }
    logger.error({ err: error }, 'Unexpected tool invocation failure');
    throw new McpError(ErrorCode.InternalError, error instanceof Error ? error.message : 'Unexpected error');
  }
});

async function runAssessment(input: AssessMaterialityInput): Promise<MaterialityReport> {
  const now = new Date();
  if (input.articles) {
    return runMaterialityAnalysis(
      { companyName: input.companyName, topics: input.topics, articles: input.articles, now },
      deps,
    );
  }

  newsSource ??= new GatewayNewsSource({ timeoutMs: config.newsGateway.timeoutMs });
  return assessMaterialityUpdates(
    { companyName: input.companyName, topics: input.topics, dateRange: resolveDateRange(input, now), now },
    { ...deps, newsSource, fetchLimit: config.newsGateway.fetchLimit },
  );
}

function resolveDateRange(input: AssessMaterialityInput, now: Date): DateRange {
  const fallback = yearToDate(now);
  try {
    return {
      start: input.startDate ? parseDateNL(input.startDate, now) : fallback.start,
      end: input.endDate ? parseDateNL(input.endDate, now) : fallback.end,
    };
  } catch (error: unknown) {
    throw new McpError(ErrorCode.InvalidParams, error instanceof Error ? error.message : 'Invalid date input');
  }
}

async function start() {
  if (config.transport === 'http') {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });
    await server.connect(transport);

    const allowedHosts = new Set(config.allowedHosts);
    const allowedOrigins = new Set(config.allowedOrigins);

    const httpServer = createServer((req, res) => {
      if (req.method === 'GET' && req.url === '/healthz') {
        res.statusCode = 200;
        res.end('ok');
        return;
      }

      if (!isHostAllowed(req.headers.host, allowedHosts)) {
        res.statusCode = 403;
        res.end('Forbidden host');
        return;
      }
      if (!isOriginAllowed(req.headers.origin, allowedOrigins)) {
        res.statusCode = 403;
        res.end('Forbidden origin');
        return;
      }

      transport.handleRequest(req, res).catch((err: unknown) => {
        logger.error({ err }, 'HTTP transport error');
        if (!res.headersSent) {
          res.statusCode = 500;
        }
        res.end('Internal Server Error');
      });
    });

    httpServer.listen(config.port, config.httpHost, () => {
      logger.info({ transport: 'http', host: config.httpHost, port: config.port }, 'Materiality Pulse server listening');
    });
  } else {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info({ transport: 'stdio' }, 'Materiality Pulse server listening');
  }
}

function isHostAllowed(hostHeader: string | undefined, allowlist: Set<string>): boolean {
  if (!allowlist.size || !hostHeader) return true;
  const host = hostHeader.split(':')[0];
  return allowlist.has(host);
}

function isOriginAllowed(originHeader: string | undefined, allowlist: Set<string>): boolean {
  if (!allowlist.size || !originHeader) return true;
  return allowlist.has(originHeader);
}

function formatReportSummary(report: MaterialityReport): string {
  const lines = [
    `Materiality Pulse: ${report.companyName}`,
    `Articles: ${report.articleSummary.accepted} accepted, ${report.articleSummary.skipped} skipped, ${report.articleSummary.afterDedup} after dedup`,
    `Update necessity: ${report.overallTrend.updateNecessity}`,
    '',
    summarizeChanges(report.topicChanges, report.overallTrend),
  ];
  if (report.recommendations.length) {
    lines.push('', 'Recommendations:');
    for (const rec of report.recommendations) {
      lines.push(`- ${rec.subject}: ${rec.action} (confidence ${rec.confidence.toFixed(2)}, ${rec.standardAlignment})`);
    }
  }
  lines.push('', ...report.guidance);
  return lines.join('\n');
}

start().catch((error: unknown) => {
  logger.error({ err: error }, 'Failed to start Materiality Pulse server');
  process.exit(1);
});
