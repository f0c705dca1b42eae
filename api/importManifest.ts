// api/importManifest.ts
// Manifest import HTTP entrypoint.
//
// POST { file_name, content_base64, format? } → ValidationReport + Danish summary.
// The request is decoded and checked here; everything about the file itself
// is decided by engine/importManifest.

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';

import { buildSummaryPayload } from './responses';
import type { HttpRequestLike, HttpResponseLike } from './responses';
import { loadImportConfig, type ImportConfig } from '../engine/config';
import {
  FatalErrorCodes,
  RequestErrorCodes,
  type FatalErrorCode,
  type RequestErrorCode
} from '../engine/errorCodes';
import { DEFAULT_FACILITY_DIRECTORY, type FacilityDirectory } from '../engine/facilityDirectory';
import { importManifest } from '../engine/importManifest';
import { createImportLogger, type ImportLogger } from '../engine/logger';
import { detectManifestFormat } from '../engine/parseManifestFile';
import type { ValidationReport } from '../engine/types';
import type { ReportSummary } from '../engine/buildReportMessage';
import type { TemplateCompatibility } from '../engine/templateCompatibility';

export interface ManifestImportDeps {
  config: ImportConfig;
  directory: FacilityDirectory;
  logger: ImportLogger;
}

export interface RequestErrorBody {
  error: string;
  error_code: RequestErrorCode;
  issues?: string[];
}

export interface ImportFatalBody {
  error: string;
  error_code: FatalErrorCode;
  report: ValidationReport;
  summary_text: string;
}

export interface ImportSuccessBody {
  report: ValidationReport;
  summary: ReportSummary;
  summary_text: string;
  compatibility: TemplateCompatibility;
}

export type ImportResponseBody = RequestErrorBody | ImportFatalBody | ImportSuccessBody;

export interface ManifestImportResult {
  status: number;
  body: ImportResponseBody;
}

const FATAL_STATUS: Record<FatalErrorCode, number> = {
  [FatalErrorCodes.FORMAT_ERROR]: 422,
  [FatalErrorCodes.SIZE_LIMIT_EXCEEDED]: 413,
  [FatalErrorCodes.ROW_LIMIT_EXCEEDED]: 413,
  [FatalErrorCodes.MISSING_COLUMNS]: 422,
  [FatalErrorCodes.DUPLICATE_COLUMNS]: 422
};

const importRequestSchema = z.object({
  file_name: z.string().max(255).optional(),
  content_base64: z.string().min(1, 'content_base64 must not be empty'),
  format: z.enum(['xlsx', 'csv']).optional()
});

const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

/** Strict base64 decode; null when the text is not canonical base64. */
export function decodeBase64(text: string): Uint8Array | null {
  const compact = text.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64_BODY.test(compact)) return null;
  return new Uint8Array(Buffer.from(compact, 'base64'));
}

function requestError(
  status: number,
  error_code: RequestErrorCode,
  error: string,
  issues?: string[]
): ManifestImportResult {
  return { status, body: issues ? { error, error_code, issues } : { error, error_code } };
}

export async function handleManifestImportBody(
  rawBody: unknown,
  deps: ManifestImportDeps
): Promise<ManifestImportResult> {
  const { logger } = deps;

  let body: unknown = rawBody;
  if (typeof rawBody === 'string') {
    try {
      body = JSON.parse(rawBody);
    } catch {
      logger.warn('invalid_json_body', { length: rawBody.length });
      return requestError(400, RequestErrorCodes.INVALID_JSON_BODY, 'Invalid JSON body.');
    }
  }

  const parsed = importRequestSchema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`
    );
    logger.warn('transport_validation_failed', { issues });
    return requestError(
      400,
      RequestErrorCodes.INVALID_REQUEST_STRUCTURE,
      'Invalid request structure.',
      issues
    );
  }

  const { file_name, content_base64 } = parsed.data;

  const bytes = decodeBase64(content_base64);
  if (!bytes) {
    logger.warn('invalid_base64_content', { file_name: file_name ?? null });
    return requestError(
      400,
      RequestErrorCodes.INVALID_BASE64,
      'content_base64 is not valid base64.'
    );
  }

  const format = parsed.data.format ?? detectManifestFormat(file_name, bytes);
  if (!format) {
    logger.warn('unsupported_file_type', { file_name: file_name ?? null });
    return requestError(
      400,
      RequestErrorCodes.UNSUPPORTED_FILE_TYPE,
      'Unsupported file type. Upload an .xlsx or .csv file.'
    );
  }

  const report = await importManifest(bytes, {
    format,
    config: deps.config,
    directory: deps.directory,
    logger
  });

  const payload = buildSummaryPayload(report);

  if (report.fatalError) {
    return {
      status: FATAL_STATUS[report.fatalError.code],
      body: {
        error: report.fatalError.message,
        error_code: report.fatalError.code,
        report,
        summary_text: payload.summary_text
      }
    };
  }

  return { status: 200, body: { report, ...payload } };
}

/**
 * Builds the request handler around a deps factory. The factory runs per
 * request so that a configuration error surfaces as a 500, not a crash at load.
 */
export function createManifestImportHandler(resolveDeps: () => ManifestImportDeps) {
  const fallbackLogger = createImportLogger();

  return async (req: HttpRequestLike, res: HttpResponseLike): Promise<void> => {
    if (req.method !== 'POST') {
      res.setHeader('Allow', 'POST');
      fallbackLogger.warn('method_not_allowed', { method: req.method ?? null });
      res.status(405).json({
        error: 'Method Not Allowed',
        error_code: RequestErrorCodes.METHOD_NOT_ALLOWED
      });
      return;
    }

    try {
      const result = await handleManifestImportBody(req.body, resolveDeps());
      res.status(result.status).json(result.body);
    } catch (err) {
      fallbackLogger.error('manifest_import_unhandled_exception', {
        message: err instanceof Error ? err.message : String(err)
      });
      res.status(500).json({
        error: 'Internal manifest import error.',
        error_code: RequestErrorCodes.INTERNAL_IMPORT_ERROR
      });
    }
  };
}

let cachedDeps: ManifestImportDeps | null = null;

function defaultDeps(): ManifestImportDeps {
  if (!cachedDeps) {
    const config = loadImportConfig();
    cachedDeps = {
      config,
      directory: DEFAULT_FACILITY_DIRECTORY,
      logger: createImportLogger({ level: config.logging.level })
    };
  }
  return cachedDeps;
}

const handle = createManifestImportHandler(defaultDeps);

export default function handler(req: VercelRequest, res: VercelResponse): Promise<void> {
  return handle(req, res);
}
