/**
 * HTTP client for the utility API
 *
 * Thin fetch wrapper: one request per call, bearer token auth, no retries.
 * Every failure surfaces as one of the provider errors so the coordinator can
 * decide whether to abort the cycle or skip an account or feed.
 */

import type { z } from "zod";
import type { CalendarDate } from "@internationalized/date";
import { API_CONFIG, ERROR_MESSAGES } from "@/config";
import { formatDateISO } from "@/lib/date-utils";
import {
  AuthenticationFailure,
  ConnectivityFailure,
  GenericProviderError,
  RetryExhausted,
  ValidationFailure,
} from "@/lib/errors";
import {
  AmiEnergyUsageSchema,
  BillingAccountSchema,
  EnergyUsageCostSchema,
  EnergyUsageSchema,
  IntervalReadSchema,
  RecordListSchema,
} from "./schemas";
import type {
  AmiEnergyUsage,
  AmiMeterIdentifier,
  BillingAccount,
  EnergyUsage,
  EnergyUsageCost,
  IntervalRead,
  UtilityApi,
} from "./types";

export interface UtilityClientOptions {
  baseUrl?: string;
  token?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

type QueryParams = Record<string, string | number>;

export class UtilityHttpClient implements UtilityApi {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: UtilityClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? API_CONFIG.baseUrl).replace(/\/+$/, "");
    this.token = options.token ?? API_CONFIG.token;
    this.timeoutMs = options.timeoutMs ?? API_CONFIG.timeout;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async fetchBillingAccount(accountId: string): Promise<BillingAccount> {
    return this.request(
      `/accounts/${encodeURIComponent(accountId)}`,
      {},
      BillingAccountSchema,
    );
  }

  async fetchEnergyUsages(
    accountId: string,
    fromMonth: number,
  ): Promise<EnergyUsage[]> {
    return this.requestList(
      `/accounts/${encodeURIComponent(accountId)}/usages`,
      { fromMonth },
      EnergyUsageSchema,
    );
  }

  async fetchEnergyUsageCosts(
    accountId: string,
    queryDate: CalendarDate,
    companyCode: string,
  ): Promise<EnergyUsageCost[]> {
    return this.requestList(
      `/accounts/${encodeURIComponent(accountId)}/costs`,
      { date: formatDateISO(queryDate), companyCode },
      EnergyUsageCostSchema,
    );
  }

  async fetchAmiEnergyUsages(
    meter: AmiMeterIdentifier,
    dateFrom: CalendarDate,
    dateTo: CalendarDate,
  ): Promise<AmiEnergyUsage[]> {
    return this.requestList(
      "/ami/usages",
      {
        meterNumber: meter.meterNumber,
        premiseNumber: meter.premiseNumber,
        servicePointNumber: meter.servicePointNumber,
        meterPointNumber: meter.meterPointNumber,
        dateFrom: formatDateISO(dateFrom),
        dateTo: formatDateISO(dateTo),
      },
      AmiEnergyUsageSchema,
    );
  }

  async fetchIntervalReads(
    premiseNumber: string,
    servicePointNumber: string,
    startTime: string,
  ): Promise<IntervalRead[]> {
    return this.requestList(
      "/interval-reads",
      { premiseNumber, servicePointNumber, startDateTime: startTime },
      IntervalReadSchema,
    );
  }

  /**
   * GET a JSON resource and validate it against a schema
   */
  private async request<T>(
    path: string,
    params: QueryParams,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const url = this.buildUrl(path, params);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          Authorization: `Bearer ${this.token}`,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      console.error(`[UtilityClient] Request to ${path} failed:`, error);
      throw new ConnectivityFailure(ERROR_MESSAGES.NETWORK_ERROR, undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => "");
      console.error(
        `[UtilityClient] ${path} returned ${response.status}: ${errorText.slice(0, 200)}`,
      );
      throw toProviderError(response.status, errorText);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ValidationFailure(
        `${ERROR_MESSAGES.INVALID_RESPONSE} (${path}: body is not JSON)`,
        error,
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationFailure(
        `${ERROR_MESSAGES.INVALID_RESPONSE} (${path}: ${formatIssue(parsed.error)})`,
        body,
      );
    }
    return parsed.data;
  }

  /**
   * GET a JSON array and validate each record. Records that fail are
   * dropped and counted; a body that is not an array fails the whole call.
   */
  private async requestList<T>(
    path: string,
    params: QueryParams,
    recordSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T[]> {
    const body = await this.request(path, params, RecordListSchema);

    const records: T[] = [];
    let dropped = 0;
    let firstIssue: string | undefined;
    for (const item of body) {
      const parsed = recordSchema.safeParse(item);
      if (parsed.success) {
        records.push(parsed.data);
        continue;
      }
      dropped++;
      if (firstIssue === undefined) firstIssue = formatIssue(parsed.error);
    }

    if (dropped > 0) {
      console.warn(
        `[UtilityClient] ${path}: dropped ${dropped} of ${body.length} malformed records (${firstIssue ?? "unexpected shape"})`,
      );
    }
    return records;
  }

  private buildUrl(path: string, params: QueryParams): string {
    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      query.set(key, String(value));
    }
    const qs = query.toString();
    return qs ? `${this.baseUrl}${path}?${qs}` : `${this.baseUrl}${path}`;
  }
}

function formatIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "unexpected shape";
  return issue.path.length > 0
    ? `${issue.path.join(".")}: ${issue.message}`
    : issue.message;
}

function toProviderError(status: number, detail: string) {
  if (status === 401 || status === 403) {
    return new AuthenticationFailure(ERROR_MESSAGES.AUTH_FAILED, status);
  }
  if (status === 429) {
    return new RetryExhausted(ERROR_MESSAGES.RATE_LIMITED, status);
  }
  return new GenericProviderError(
    detail ? `HTTP ${status}: ${detail.slice(0, 200)}` : `HTTP ${status}`,
    status,
  );
}
