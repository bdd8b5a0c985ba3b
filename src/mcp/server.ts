import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as z from 'zod/v4';
import type { Logger } from 'pino';

import type { AppConfig } from '../config.js';
import { actionableErrorFields, asNegotiationError, type ErrorCode } from '../errors.js';
import { outcomeForError, type NegotiationHistory } from '../history/negotiationHistory.js';
import { parseHeaderTerms } from '../negotiation/headerTermParser.js';
import { negotiatorFor } from '../negotiation/index.js';
import { negotiatedQualityToDecimal, qualityToDecimal } from '../negotiation/quality.js';
import type { NegotiatedCandidate, NegotiationKind, Negotiator, Term } from '../negotiation/types.js';

export interface ServerDependencies {
  config: AppConfig;
  logger: Logger;
  history: NegotiationHistory;
}

const KINDS = ['charset', 'encoding', 'language', 'mediaType'] as const satisfies readonly NegotiationKind[];
const OUTCOMES = ['selected', 'not_acceptable', 'malformed_header', 'invalid_availability', 'error'] as const;

function toJsonText(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function successResult(data: unknown) {
  const structuredContent: Record<string, unknown> = {
    result: data
  };
  return {
    content: [
      {
        type: 'text' as const,
        text: toJsonText(data)
      }
    ],
    structuredContent
  };
}

function errorResult(code: ErrorCode, message: string, details?: Record<string, unknown>) {
  const actionable = actionableErrorFields(code);
  const error = {
    code,
    message,
    ...actionable,
    ...(details === undefined ? {} : { details })
  };
  return {
    isError: true,
    content: [
      {
        type: 'text' as const,
        text: toJsonText({
          error
        })
      }
    ],
    structuredContent: {
      error
    }
  };
}

function toTermOutput(term: Term) {
  return {
    position: term.position,
    value: term.value,
    quality: qualityToDecimal(term.quality),
    explicitQuality: term.hasExplicitQuality
  };
}

function toRankingOutput(candidate: NegotiatedCandidate) {
  return {
    id: candidate.id,
    weight: qualityToDecimal(candidate.weight),
    termQuality: qualityToDecimal(candidate.termQuality),
    negotiatedQuality: negotiatedQualityToDecimal(candidate.negotiatedQuality),
    position: candidate.position,
    explicitQuality: candidate.hasExplicitQuality,
    matchedTerm: candidate.matchedTerm ?? null
  };
}

export function buildMcpServer(deps: ServerDependencies): McpServer {
  const { config, logger, history } = deps;

  const server = new McpServer(
    {
      name: 'accept-negotiator',
      version: '1.0.0'
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  const negotiatorOptions = { maxLength: config.maxHeaderLength };
  const negotiators: Record<NegotiationKind, Negotiator> = {
    charset: negotiatorFor('charset', negotiatorOptions),
    encoding: negotiatorFor('encoding', negotiatorOptions),
    language: negotiatorFor('language', negotiatorOptions),
    mediaType: negotiatorFor('mediaType', negotiatorOptions)
  };

  async function recordNegotiation(kind: NegotiationKind, header: string, available: Record<string, number>) {
    const started = Date.now();
    const negotiator = negotiators[kind];
    const availableIds = Object.keys(available);

    try {
      const { selected: top, ranking } = negotiator.select(header, available);
      const selected = top.id;
      const negotiatedQuality = negotiatedQualityToDecimal(top.negotiatedQuality);

      await history.record({
        kind,
        header,
        available: availableIds,
        result: 'selected',
        selected,
        negotiatedQuality,
        durationMs: Date.now() - started
      });
      logger.debug({ kind, header, selected, negotiatedQuality }, 'Negotiated representation');

      return successResult({
        kind,
        headerName: negotiator.strategy.headerName,
        selected,
        negotiatedQuality,
        ranking: ranking.map(toRankingOutput)
      });
    } catch (error) {
      const mapped = asNegotiationError(error);
      await history.record({
        kind,
        header,
        available: availableIds,
        result: outcomeForError(mapped.code),
        durationMs: Date.now() - started,
        errorCode: mapped.code,
        message: mapped.message
      });
      logger.info({ kind, header, code: mapped.code }, mapped.message);
      return errorResult(mapped.code, mapped.message, mapped.details);
    }
  }

  server.registerTool(
    'negotiation.negotiate',
    {
      description:
        'Pick the best available representation for a raw Accept, Accept-Charset, Accept-Encoding or Accept-Language header value.',
      inputSchema: {
        kind: z.enum(KINDS),
        header: z.string().optional().default(''),
        available: z.record(z.string(), z.number())
      }
    },
    async ({ kind, header, available }) => {
      return recordNegotiation(kind, header, available);
    }
  );

  server.registerTool(
    'negotiation.parse',
    {
      description: 'Parse a raw Accept-* header into ordered terms. With a kind, implicit default terms are included.',
      inputSchema: {
        header: z.string(),
        kind: z.enum(KINDS).optional()
      }
    },
    async ({ header, kind }) => {
      try {
        const terms = kind ? negotiators[kind].parse(header) : parseHeaderTerms(header, negotiatorOptions);
        return successResult({
          kind: kind ?? null,
          terms: terms.map(toTermOutput)
        });
      } catch (error) {
        const mapped = asNegotiationError(error);
        return errorResult(mapped.code, mapped.message, mapped.details);
      }
    }
  );

  server.registerTool(
    'negotiation.history.query',
    {
      description: 'List recent negotiation outcomes, newest first.',
      inputSchema: {
        kind: z.enum(KINDS).optional(),
        result: z.enum(OUTCOMES).optional(),
        since: z.string().optional(),
        limit: z.number().int().optional().default(20)
      }
    },
    async ({ kind, result, since, limit }) => {
      const entries = history.query({ kind, result, since, limit });
      return successResult({
        total: entries.length,
        entries
      });
    }
  );

  return server;
}
