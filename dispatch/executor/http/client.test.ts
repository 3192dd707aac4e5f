import { describe, it, expect } from "vitest";
import axios, {
  AxiosError,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";
import pino from "pino";
import { DISPATCH_ENDPOINT, HttpDispatchClient, buildPayload } from "./client.js";
import { staticToken, type TokenProvider } from "../client.js";
import type { LiftToZoneTask, RegionPickupTask } from "../../model/types.js";

const logger = pino({ level: "silent" });

const liftTask: LiftToZoneTask = {
  id: "t-1",
  type: "LiftToZone",
  source: "L-1",
  destination: "DZ-A",
  submittedAt: 0,
};

const regionTask: RegionPickupTask = {
  id: "t-2",
  type: "RegionPickup",
  source: { locationId: "A-1", area: "A", number: 1 },
  destination: "LIFT-1",
  submittedAt: 0,
};

type Reply = { status: number; data: unknown } | { error: AxiosError };

/** axios instance whose adapter answers with `reply` and records every request. */
function fakeHttp(reply: Reply) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config): Promise<AxiosResponse> => {
      requests.push(config);
      if ("error" in reply) throw reply.error;
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: "",
        headers: {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError("Request failed", "ERR_BAD_RESPONSE", config, null, response);
      }
      return response;
    },
  });
  return { http, requests };
}

function clientWith(reply: Reply, token: TokenProvider = staticToken("test-secret"), sceneId?: number) {
  const { http, requests } = fakeHttp(reply);
  const client = new HttpDispatchClient(
    { baseUrl: "http://dispatch.test", token, successCodes: [50421021], sceneId, http },
    logger,
  );
  return { client, requests };
}

const submitOptions = () => ({ timeoutMs: 5_000, signal: new AbortController().signal });

describe("HttpDispatchClient", () => {
  it("PUTs the task with a bearer token", async () => {
    const { client, requests } = clientWith({ status: 200, data: { success: true } });

    const outcome = await client.submit(liftTask, submitOptions());

    expect(outcome).toEqual({ kind: "Success", code: null });
    const [request] = requests;
    expect(request?.method).toBe("put");
    expect(request?.url).toBe(DISPATCH_ENDPOINT);
    expect(request?.timeout).toBe(5_000);
    expect(request?.headers.get("Authorization")).toBe("Bearer test-secret");
    expect(request?.data).toBe(JSON.stringify({ location_id: "L-1", area: "DZ-A" }));
  });

  it("classifies business replies", async () => {
    const { client } = clientWith({
      status: 200,
      data: { success: false, msg: { detail: { error_id: 7001, info: "location locked" } } },
    });

    expect(await client.submit(liftTask, submitOptions())).toEqual({
      kind: "BusinessFailure",
      code: 7001,
      info: "location locked",
    });
  });

  it("counts the already-exists code as success", async () => {
    const { client } = clientWith({
      status: 200,
      data: { success: false, msg: { detail: { error_id: 50421021, info: "exists" } } },
    });

    expect(await client.submit(liftTask, submitOptions())).toEqual({
      kind: "Success",
      code: 50421021,
    });
  });

  it("turns a 401 into an auth rejection", async () => {
    const { client } = clientWith({ status: 401, data: { detail: "bad token" } });

    expect(await client.submit(liftTask, submitOptions())).toEqual({
      kind: "TransportFailure",
      reason: "auth-rejected",
      status: 401,
    });
  });

  it("turns a server error into a transport failure", async () => {
    const { client } = clientWith({ status: 502, data: "" });

    expect(await client.submit(liftTask, submitOptions())).toEqual({
      kind: "TransportFailure",
      reason: "http-502",
      status: 502,
    });
  });

  it("turns a refused connection into a transport failure", async () => {
    const { client } = clientWith({ error: new AxiosError("connect refused", "ECONNREFUSED") });

    expect(await client.submit(liftTask, submitOptions())).toEqual({
      kind: "TransportFailure",
      reason: "network: ECONNREFUSED",
    });
  });

  it("reports a failing token provider without sending anything", async () => {
    const token: TokenProvider = {
      getToken: async () => {
        throw new Error("token expired");
      },
    };
    const { client, requests } = clientWith({ status: 200, data: { success: true } }, token);

    expect(await client.submit(liftTask, submitOptions())).toEqual({
      kind: "TransportFailure",
      reason: "error: token expired",
    });
    expect(requests).toHaveLength(0);
  });

  it("sends the region pickup payload with the scene id", async () => {
    const { client, requests } = clientWith(
      { status: 200, data: { success: true } },
      staticToken("test-secret"),
      3,
    );

    await client.submit(regionTask, submitOptions());

    expect(requests[0]?.data).toBe(
      JSON.stringify({ location_id: "A-1", store_location_id: "LIFT-1", scene_id: 3 }),
    );
  });
});

describe("buildPayload", () => {
  it("omits the scene id when none is configured", () => {
    expect(buildPayload(regionTask)).toEqual({ location_id: "A-1", store_location_id: "LIFT-1" });
  });
});
