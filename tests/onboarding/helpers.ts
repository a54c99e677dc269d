/**
 * Shared test doubles for the onboarding tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import axios, { AxiosAdapter, AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { SendMailOptions } from 'nodemailer';
import { MailConfig } from '../../src/onboarding/config';
import { MailTransportFactory } from '../../src/onboarding/notification';
import { Employee } from '../../src/onboarding/types';
import { OnboardingLogger } from '../../src/onboarding/utils/logger';

export type FakeReply = { status: number; data?: unknown } | { networkError: string };

export interface FakeHttp {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
}

/**
 * Axios instance whose requests are answered in process by `reply`
 */
export function createFakeHttp(reply: (config: InternalAxiosRequestConfig) => FakeReply): FakeHttp {
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async config => {
    requests.push(config);
    const result = reply(config);

    if ('networkError' in result) {
      throw new AxiosError(result.networkError, AxiosError.ERR_NETWORK, config);
    }

    const response: AxiosResponse = {
      data: result.data,
      status: result.status,
      statusText: String(result.status),
      headers: {},
      config
    };

    if (result.status < 200 || result.status >= 300) {
      throw new AxiosError(
        `Request failed with status code ${result.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        undefined,
        response
      );
    }

    return response;
  };

  return { http: axios.create({ adapter }), requests };
}

export interface FakeTransport {
  factory: MailTransportFactory;
  sent: SendMailOptions[];
  configs: MailConfig[];
  closed: number;
}

/**
 * Mail transport factory that records messages instead of opening SMTP sessions.
 * `fail` decides, per message, whether sendMail rejects with that message.
 */
export function createFakeTransport(fail: (mail: SendMailOptions) => string | undefined = () => undefined): FakeTransport {
  const fake: FakeTransport = {
    factory: config => {
      fake.configs.push(config);
      return {
        sendMail: async (mail: SendMailOptions) => {
          const failure = fail(mail);
          if (failure) {
            throw new Error(failure);
          }
          fake.sent.push(mail);
          return { messageId: `<fake-${fake.sent.length}@test>` };
        },
        close: () => {
          fake.closed += 1;
        }
      };
    },
    sent: [],
    configs: [],
    closed: 0
  };
  return fake;
}

export function silentLogger(): OnboardingLogger {
  return new OnboardingLogger({ consoleOutput: false });
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'onboarding-test-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** 2026-10-18 15:30 local time */
export const NOW = new Date(2026, 9, 18, 15, 30, 0);

export function makeEmployee(overrides: Partial<Employee> = {}): Employee {
  return {
    name: 'Ada Lovelace',
    email: 'ada@example.com',
    department: 'Engineering',
    startDate: '2026-10-20',
    manager: 'Charles Babbage',
    ...overrides
  };
}
