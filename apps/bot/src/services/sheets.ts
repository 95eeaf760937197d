import { google, type sheets_v4 } from 'googleapis';
import type { Logger } from 'pino';
import { toRowValues, WriteError, type LinkSink, type SpreadsheetRow } from '@linklog/core';

const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

export type SheetValues = {
  append(
    params: sheets_v4.Params$Resource$Spreadsheets$Values$Append,
    options?: { timeout?: number }
  ): Promise<{ data: sheets_v4.Schema$AppendValuesResponse }>;
};

export type SheetsLinkSinkOptions = {
  values: SheetValues;
  spreadsheetId: string;
  range: string;
  logger: Logger;
  timeoutMs?: number;
};

/** Loads the service account key up front so a bad key file fails startup. */
export async function createSheetsValues(credentialsFile: string): Promise<sheets_v4.Resource$Spreadsheets$Values> {
  const auth = new google.auth.GoogleAuth({
    keyFile: credentialsFile,
    scopes: [SHEETS_SCOPE]
  });
  await auth.getClient();
  return google.sheets({ version: 'v4', auth }).spreadsheets.values;
}

export function createSheetsLinkSink(options: SheetsLinkSinkOptions): LinkSink {
  const { values, spreadsheetId, range, logger, timeoutMs } = options;

  return {
    async append(row: SpreadsheetRow) {
      try {
        const result = await values.append(
          {
            spreadsheetId,
            range,
            valueInputOption: 'USER_ENTERED',
            requestBody: { values: [toRowValues(row)] }
          },
          { timeout: timeoutMs }
        );
        logger.info(
          { link: row.link, updatedCells: result.data.updates?.updatedCells ?? 0 },
          'Appended row to sheet'
        );
      } catch (error) {
        throw new WriteError(row.link, `Failed to append ${row.link} to sheet`, { cause: error });
      }
    }
  };
}
