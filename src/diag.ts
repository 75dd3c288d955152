// src/diag.ts
import fs from 'fs';
import { loadConfig, type EtlConfig } from './config';
import { ConfigError, describeError } from './errors';
import { GoogleSheetsSink, createSheetsApi, type SheetsApi } from './sinks/google_sheets';
import { isRecord } from './utils';

const DIAG_VARS = [
  'SOURCES',
  'SHOTGUN_EMAIL',
  'SHOTGUN_PASSWORD',
  'CHROME_EXECUTABLE_PATH',
  'BROWSER_WS_ENDPOINT',
  'DICE_API_TOKEN',
  'GOOGLE_APPLICATION_CREDENTIALS',
  'GSHEET_ID',
  'GSHEET_DOC_TITLE',
  'GSHEET_WORKSHEET',
  'GSHEET_HISTORY_WORKSHEET',
  'PUSHGATEWAY_URL',
];

const SECRET_RE = /PASSWORD|TOKEN|SECRET|WS_ENDPOINT/;

/** Secrets show their length only; other values are shown as set. */
export function maskValue(name: string, value: string | undefined): string {
  if (value === undefined || value.trim() === '') return '<unset>';
  if (SECRET_RE.test(name)) return `<set, ${value.length} chars>`;
  return value;
}

/** `client_email` of a service-account key file; throws when the file is not one. */
export function readServiceAccountEmail(file: string): string {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  if (!isRecord(parsed) || typeof parsed.client_email !== 'string') {
    throw new Error(`${file} is not a service-account key (no client_email)`);
  }
  return parsed.client_email;
}

/** Checks the environment and, when publishing is on, that the spreadsheet opens. Returns an exit code. */
export async function runDiagnostics(
  env: Record<string, string | undefined> = process.env,
  makeApi: (credentialsPath: string) => SheetsApi = createSheetsApi,
): Promise<number> {
  for (const name of DIAG_VARS) {
    console.log(`[diag] ${name}=${maskValue(name, env[name])}`);
  }

  let config: EtlConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error('[diag] configuration error', { missing: err.missing });
    return 1;
  }
  console.log('[diag] configuration ok', { sources: config.sources, strategy: config.matcher.strategy });

  if (!config.sheet.enabled) {
    console.log('[diag] sheet publishing disabled, skipping sheet check');
    return 0;
  }

  try {
    const email = readServiceAccountEmail(config.sheet.credentialsPath);
    console.log('[diag] service account', { email });
    const api = makeApi(config.sheet.credentialsPath);
    const spreadsheetId = await new GoogleSheetsSink(api, config.sheet).resolveSpreadsheet();
    const worksheets = await api.listWorksheets(spreadsheetId);
    console.log('[diag] spreadsheet reachable', { spreadsheetId, worksheets: worksheets.map(ws => ws.title) });
    return 0;
  } catch (err) {
    console.error('[diag] sheet check failed (is the spreadsheet shared with the service account?)', {
      error: describeError(err),
    });
    return 1;
  }
}

if (require.main === module) {
  runDiagnostics()
    .then(code => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error('[diag] crashed', err);
      process.exitCode = 1;
    });
}
