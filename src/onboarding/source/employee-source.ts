/**
 * Employee source backed by the Google Sheets values API.
 *
 * The sheet is expected to hold a header row followed by one employee per row
 * in columns A-E: name, email, department, start date (YYYY-MM-DD), manager.
 * Month and day may be written without zero padding, and the day may carry
 * a single leading space in place of the zero (`2026-1-5`, `2026-01- 5`).
 */

import axios, { AxiosInstance, isAxiosError } from 'axios';
import { SheetsConfig } from '../config';
import { Employee } from '../types';
import { OnboardingLogger } from '../utils/logger';
import { OnboardingError, OnboardingErrorHandler, OnboardingErrorType, toError } from '../utils/error-handler';

export const SHEETS_API_BASE_URL = 'https://sheets.googleapis.com/v4/spreadsheets';

/** Days ahead of today, inclusive, that count as "starting soon" */
export const ONBOARDING_WINDOW_DAYS = 7;

const MS_PER_DAY = 86400000;
const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2}| \d)$/;

export type EmployeeFetchResult =
  | { ok: true; employees: Employee[] }
  | { ok: false; error: OnboardingError };

export interface EmployeeSource {
  fetchNewEmployees(): Promise<EmployeeFetchResult>;
}

export interface SheetsEmployeeSourceOptions {
  /** HTTP client, defaults to an axios instance with timeoutMs */
  http?: AxiosInstance;
  timeoutMs?: number;
  /** Clock used for the onboarding window */
  now?: () => Date;
  baseUrl?: string;
}

/**
 * Day number (days since the epoch) of a YYYY-MM-DD calendar date,
 * or null when the string is not a real date in that format.
 */
export function parseIsoDate(value: string): number | null {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return null;
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return date.getTime() / MS_PER_DAY;
}

/**
 * Day number of the local calendar date of `now`
 */
export function localDayNumber(now: Date): number {
  return Date.UTC(now.getFullYear(), now.getMonth(), now.getDate()) / MS_PER_DAY;
}

/**
 * Local calendar date of `date` as YYYY-MM-DD
 */
export function formatIsoDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * True when startDate is a valid YYYY-MM-DD date between today and
 * ONBOARDING_WINDOW_DAYS days from now, both ends inclusive.
 */
export function isNewEmployee(startDate: string, now: Date = new Date()): boolean {
  const start = parseIsoDate(startDate);
  if (start === null) {
    return false;
  }
  const daysUntilStart = start - localDayNumber(now);
  return daysUntilStart >= 0 && daysUntilStart <= ONBOARDING_WINDOW_DAYS;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformedPayload(message: string): OnboardingError {
  return new OnboardingError(`Malformed spreadsheet payload: ${message}`, OnboardingErrorType.SOURCE_FETCH_ERROR, {
    operation: 'fetch_new_employees'
  });
}

/**
 * Employees from a values API response body, header row skipped.
 * Throws an OnboardingError when the body does not have the expected shape.
 */
export function parseSheetPayload(payload: unknown, now: Date): Employee[] {
  if (!isRecord(payload)) {
    throw malformedPayload('response body is not a JSON object');
  }

  // the API omits "values" entirely for an empty range
  if (payload.values === undefined) {
    return [];
  }
  if (!Array.isArray(payload.values)) {
    throw malformedPayload('"values" is not a list');
  }

  const rows: unknown[][] = [];
  for (const row of payload.values) {
    if (!Array.isArray(row)) {
      throw malformedPayload('"values" contains a row that is not a list');
    }
    rows.push(row);
  }

  const employees: Employee[] = [];
  for (const row of rows.slice(1)) {
    if (row.length < 5) {
      continue;
    }

    const cells = row.map(cell => (cell === null || cell === undefined ? '' : String(cell)));
    if (!isNewEmployee(cells[3], now)) {
      continue;
    }

    employees.push({
      name: cells[0],
      email: cells[1],
      department: cells[2],
      startDate: cells[3],
      manager: cells[4]
    });
  }

  return employees;
}

export class SheetsEmployeeSource implements EmployeeSource {
  private config: SheetsConfig;
  private logger: OnboardingLogger;
  private errorHandler: OnboardingErrorHandler;
  private http: AxiosInstance;
  private now: () => Date;
  private baseUrl: string;

  constructor(config: SheetsConfig, logger: OnboardingLogger, options: SheetsEmployeeSourceOptions = {}) {
    this.config = config;
    this.logger = logger;
    this.errorHandler = new OnboardingErrorHandler(logger);
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 10000 });
    this.now = options.now ?? (() => new Date());
    this.baseUrl = options.baseUrl ?? SHEETS_API_BASE_URL;
  }

  buildUrl(): string {
    return `${this.baseUrl}/${encodeURIComponent(this.config.sheetId)}/values/${encodeURIComponent(this.config.range)}`;
  }

  async fetchNewEmployees(): Promise<EmployeeFetchResult> {
    try {
      const response = await this.http.get<unknown>(this.buildUrl(), {
        params: { key: this.config.apiKey }
      });

      const employees = parseSheetPayload(response.data, this.now());
      this.logger.info(`Found ${employees.length} new employees`, undefined, 'fetch_new_employees');
      return { ok: true, employees };
    } catch (error) {
      const fetchError = this.toFetchError(error);
      this.errorHandler.handleError(fetchError);
      return { ok: false, error: fetchError };
    }
  }

  private toFetchError(error: unknown): OnboardingError {
    if (error instanceof OnboardingError) {
      return error;
    }

    const details: Record<string, unknown> = {};
    if (isAxiosError(error)) {
      if (error.response) details.status = error.response.status;
      if (error.code) details.code = error.code;
    }

    const err = toError(error);
    return new OnboardingError(err.message, OnboardingErrorType.SOURCE_FETCH_ERROR, {
      operation: 'fetch_new_employees',
      details,
      cause: err
    });
  }
}
