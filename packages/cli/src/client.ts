import {
  HistoryResponseSchema,
  RunDetailSchema,
  StatusResponseSchema,
  TriggerResponseSchema,
  type HistoryResponse,
  type RunDetail,
  type StatusResponse,
  type TriggerRequest,
  type TriggerResponse
} from "@shipgate/core";
import { z } from "zod";

const ErrorBodySchema = z.object({ error: z.string() }).partial();

export class ShipgateHttpClient {
  constructor(private readonly baseUrl: string) {}

  async health(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/health`);
      return res.ok;
    } catch {
      return false;
    }
  }

  async status(): Promise<StatusResponse> {
    return StatusResponseSchema.parse(await this.request("GET", "/api/status"));
  }

  async trigger(request: TriggerRequest = {}): Promise<TriggerResponse> {
    return TriggerResponseSchema.parse(await this.request("POST", "/api/runs", request));
  }

  async history(limit = 10): Promise<HistoryResponse> {
    return HistoryResponseSchema.parse(await this.request("GET", `/api/runs?limit=${limit}`));
  }

  async run(id: string): Promise<RunDetail> {
    return RunDetailSchema.parse(await this.request("GET", `/api/runs/${encodeURIComponent(id)}`));
  }

  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    const init: RequestInit = {
      method,
      ...(body ? { headers: { "Content-Type": "application/json" } } : {}),
      ...(body ? { body: JSON.stringify(body) } : {})
    };

    const response = await fetch(`${this.baseUrl}${path}`, init);

    const data: unknown = await response.json().catch(() => ({}));
    if (!response.ok) {
      const parsed = ErrorBodySchema.safeParse(data);
      throw new Error((parsed.success ? parsed.data.error : undefined) ?? `HTTP ${response.status}`);
    }
    return data;
  }
}
