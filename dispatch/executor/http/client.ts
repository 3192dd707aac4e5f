import axios, { type AxiosInstance } from "axios";
import pino from "pino";
import type { Outcome, Task } from "../../model/types.js";
import type { DispatchClient, SubmitOptions, TokenProvider } from "../client.js";
import { classifyResponse, classifyTransportError } from "./response.js";

export const DISPATCH_ENDPOINT = "/dispatch_server/dispatch/start/location_call/task/";

export interface HttpDispatchClientOptions {
  /** e.g. http://dispatch-host:9991 */
  baseUrl: string;
  token: TokenProvider;
  successCodes: readonly number[];
  /** Map scene attached to region pickups */
  sceneId?: number;
  /** Pre-built axios instance (tests inject one with a custom adapter) */
  http?: AxiosInstance;
}

export function buildPayload(task: Task, sceneId?: number): Record<string, unknown> {
  switch (task.type) {
    case "LiftToZone":
      return { location_id: task.source, area: task.destination };
    case "RegionPickup":
      return {
        location_id: task.source.locationId,
        store_location_id: task.destination,
        ...(sceneId !== undefined ? { scene_id: sceneId } : {}),
      };
  }
}

/**
 * Dispatch client over the warehouse HTTP API. Never throws: every fault
 * comes back as a TransportFailure outcome.
 */
export class HttpDispatchClient implements DispatchClient {
  private http: AxiosInstance;
  private logger: pino.Logger;
  private successCodes: ReadonlySet<number>;

  constructor(
    private readonly options: HttpDispatchClientOptions,
    logger?: pino.Logger,
  ) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        headers: { "Content-Type": "application/json" },
      });
    this.successCodes = new Set(options.successCodes);
    this.logger = (logger ?? pino({ level: "info" })).child({
      component: "shuttlerun.http",
    });
  }

  async submit(task: Task, options: SubmitOptions): Promise<Outcome> {
    const payload = buildPayload(task, this.options.sceneId);

    try {
      const token = await this.options.token.getToken();
      const response = await this.http.put<unknown>(DISPATCH_ENDPOINT, payload, {
        headers: { Authorization: `Bearer ${token}` },
        timeout: options.timeoutMs,
        signal: options.signal,
      });

      this.logger.debug(
        { taskId: task.id, status: response.status, body: response.data },
        "Dispatch response received",
      );
      return classifyResponse(response.data, this.successCodes);
    } catch (err) {
      const outcome = classifyTransportError(err);
      this.logger.debug({ taskId: task.id, err }, "Dispatch request failed");
      return outcome;
    }
  }
}
