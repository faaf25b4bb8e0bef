import { afterEach, describe, expect, it, vi } from "vitest";
import { DatabaseError } from "pg";
import { createApp, type AppOptions } from "../app";
import { MemoryPeopleRepository, type PeopleRepository } from "../models/personModel";
import type { ErrorReporter } from "../services/errorReporter";
import { HTML, JSON_BODY, PUBLIC_DIR, TEMPLATES, UUID_PATTERN, captureLogging, listen, type LogRecord } from "./helpers";

const REPORT_TOKEN = "0f8c6d3a9b2e4c1d8e7f6a5b4c3d2e1f";

function seededPeople() {
  return new MemoryPeopleRepository(
    [
      { name: "Ada Lovelace", email: "ada@example.com" },
      { name: "Alan Turing" },
    ],
    () => new Date("2024-01-01T00:00:00.000Z")
  );
}

let close: (() => Promise<void>) | undefined;

afterEach(async () => {
  await close?.();
  close = undefined;
});

async function start(opts: Partial<AppOptions> = {}) {
  const { logging, records } = captureLogging();
  const app = createApp({ logging, people: seededPeople(), ...opts });
  const server = await listen(app);
  close = server.close;
  return { ...server, records };
}

function failingPeople(error: unknown): PeopleRepository {
  const repo = seededPeople();
  return {
    list: () => Promise.reject(error),
    get: () => Promise.reject(error),
    create: (input) => repo.create(input),
    searchByName: (name) => repo.searchByName(name),
  };
}

function requestRecord(records: LogRecord[], uri: string) {
  return records.find((r) => r.uri === uri && typeof r.ms === "number");
}

describe("framework defaults", () => {
  it("answers unmatched routes with an HTML 404", async () => {
    const { fetch } = await start();
    const res = await fetch("/nope");
    expect(res.status).toBe(404);
    expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");
    expect(await res.text()).toBe("<html><title>404: Not Found</title><body>404: Not Found</body></html>");
  });

  it("answers unsupported methods on a matched route with 405", async () => {
    const { fetch } = await start();
    const res = await fetch("/people", { method: "PUT", body: "" });
    expect(res.status).toBe(405);
    expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");
    expect(await res.text()).toContain("405: Method Not Allowed");
  });

  it("renders the custom error template for unmatched routes when configured", async () => {
    const { fetch } = await start({ templatePath: TEMPLATES, errorTemplate: "error.html" });
    const res = await fetch("/page/404");
    expect(res.status).toBe(404);
    expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");
    expect(await res.text()).toContain("Your custom error page for 404");
  });
});

describe("request identification", () => {
  it("echoes the client request id", async () => {
    const { fetch } = await start();
    const res = await fetch("/people", { headers: { "X-Request-Id": "req-123" } });
    expect(res.headers.get("x-request-id")).toBe("req-123");
    const body = await res.json();
    expect(body.meta.request).toBe("req-123");
  });

  it("generates a UUID when the client sends none", async () => {
    const { fetch } = await start();
    const res = await fetch("/healthz");
    expect(res.headers.get("x-request-id")).toMatch(UUID_PATTERN);
    expect(res.headers.get("x-powered-by")).toBeNull();
    expect(res.headers.get("server")).toBeNull();
  });
});

describe("response shaping", () => {
  it("wraps lists in a resource envelope", async () => {
    const { fetch } = await start();
    const res = await fetch("/people", { headers: { "X-Request-Id": "req-list" } });
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("application/json; charset=utf-8");
    expect(await res.json()).toEqual({
      people: [
        { id: 1, name: "Ada Lovelace", email: "ada@example.com", created_at: "2024-01-01T00:00:00.000Z" },
        { id: 2, name: "Alan Turing", email: null, created_at: "2024-01-01T00:00:00.000Z" },
      ],
      meta: { total: 2, status: 200, request: "req-list" },
    });
  });

  it("adds meta to single objects and keeps the status", async () => {
    const { fetch } = await start();
    const res = await fetch("/people", {
      method: "POST",
      headers: { ...JSON_BODY, "X-Request-Id": "req-create" },
      body: JSON.stringify({ name: "Grace Hopper" }),
    });
    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      id: 3,
      name: "Grace Hopper",
      email: null,
      created_at: "2024-01-01T00:00:00.000Z",
      meta: { status: 201, request: "req-create" },
    });
  });

  it("renders the list template for HTML clients", async () => {
    const { fetch } = await start({ templatePath: TEMPLATES });
    const res = await fetch("/people", { headers: HTML });
    expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");
    expect(await res.text()).toBe("<ul><li>Ada Lovelace</li><li>Alan Turing</li></ul><p>total 2</p>\n");
  });

  it("renders the single-item template when an id is addressed", async () => {
    const { fetch } = await start({ templatePath: TEMPLATES });
    const res = await fetch("/people/2", { headers: { ...HTML, "X-Request-Id": "req-one" } });
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("<h1>Alan Turing</h1><p>request req-one</p>\n");
  });

  it("falls back to a diagnostic string when the template is missing", async () => {
    const { fetch } = await start({ templatePath: TEMPLATES });
    const res = await fetch("/people.txt");
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
    expect(await res.text()).toBe("template not found at txt/people_get_many.txt");
  });

  it("takes the format from the path over the Accept header", async () => {
    const { fetch } = await start({ templatePath: TEMPLATES });
    const res = await fetch("/people.json", { headers: HTML });
    expect(res.headers.get("content-type")).toBe("application/json; charset=utf-8");
    const body = await res.json();
    expect(body.meta.total).toBe(2);
  });
});

describe("error classification", () => {
  it("reports a type mismatch on a string field", async () => {
    const { fetch } = await start({ templatePath: TEMPLATES });
    const res = await fetch("/people", { method: "POST", headers: { ...HTML, ...JSON_BODY }, body: JSON.stringify({ name: 10 }) });
    expect(res.status).toBe(400);
    expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");
    const body = await res.text();
    expect(body).toContain("<h1>400</h1>");
    expect(body).toContain("<pre>Invalid value 10 (number): must be string (at name)</pre>");
  });

  it("returns the validation fields to JSON clients", async () => {
    const { fetch } = await start();
    const res = await fetch("/people", { method: "POST", headers: JSON_BODY, body: JSON.stringify({ name: "Ada", extra: true }) });
    expect(res.status).toBe(400);
    const body = await res.json();
    expect(body.error).toEqual({
      forHuman: "Unexpected properties `extra`",
      forRobot: "invalid_input",
      uri: "/people",
      context: ["extra"],
    });
    expect(body.meta.status).toBe(400);
  });

  it("rejects a non-numeric page size", async () => {
    const { fetch } = await start();
    const res = await fetch("/people?limit=ten");
    expect(res.status).toBe(400);
    expect((await res.json()).error).toEqual({
      forHuman: 'Invalid value "ten" (nan): must be number (at limit)',
      forRobot: "invalid_input",
      uri: "/people?limit=ten",
      context: ["limit"],
    });
  });

  it("pages through the list with the parsed query", async () => {
    const { fetch } = await start();
    const body = await (await fetch("/people?limit=1&offset=1")).json();
    expect(body.people.map((p: { name: string }) => p.name)).toEqual(["Alan Turing"]);
    expect(body.meta.total).toBe(1);
  });

  it("turns a failed assertion into a 400 with the request uri", async () => {
    const { fetch } = await start({ templatePath: TEMPLATES });
    const res = await fetch("/people/abc", { headers: HTML });
    expect(res.status).toBe(400);
    const body = await res.text();
    expect(body).toContain("<h1>400</h1>");
    expect(body).toContain("<pre>id must be a positive integer</pre>");
    expect(body).toContain("&#34;uri&#34;: &#34;/people/abc&#34;,");
  });

  it("names a missing required argument", async () => {
    const { fetch } = await start({ templatePath: TEMPLATES });
    const res = await fetch("/people/search", { headers: HTML });
    expect(res.status).toBe(400);
    const body = await res.text();
    expect(body).toContain("<h1>400</h1>");
    expect(body).toContain("<pre>Missing required argument `name`</pre>");
    expect(body).toContain("&#34;uri&#34;: &#34;/people/search&#34;");
  });

  it("logs client errors as a single record without a traceback", async () => {
    const { fetch, records } = await start();
    await fetch("/people/search", { headers: { "X-Request-Id": "req-arg" } });
    expect(records.find((r) => r.msg === "missing-argument")).toMatchObject({
      level: 30,
      id: "req-arg",
      type: "MissingArgumentError",
      missing: "name",
    });
    expect(records.some((r) => r.msg === "traceback")).toBe(false);
  });

  it("asks for basic credentials on 401", async () => {
    const { fetch } = await start();
    const res = await fetch("/people/private");
    expect(res.status).toBe(401);
    expect(res.headers.get("www-authenticate")).toBe("Basic realm=Restricted");
    const body = await res.json();
    expect(body.error).toEqual({ forHuman: "Unauthorized", forRobot: "credentials required", uri: "/people/private" });
  });

  it("passes explicit HTTP errors through", async () => {
    const { fetch } = await start();
    const res = await fetch("/people/99");
    expect(res.status).toBe(404);
    const body = await res.json();
    expect(body.error.forRobot).toBe("person 99 not found");
  });

  it("hides database rejections behind a 500", async () => {
    const rejection = new DatabaseError('relation "people" does not exist', 0, "error");
    const { fetch, records } = await start({ people: failingPeople(rejection) });
    const res = await fetch("/people/1");
    expect(res.status).toBe(500);
    const body = await res.json();
    expect(body.error.forHuman).toBe("Internal Server Error");
    expect(body.error.forRobot).toBe("rejected sql query");
    expect(records.find((r) => r.msg === "traceback")).toMatchObject({
      level: 50,
      sql: 'relation "people" does not exist',
      uri: "/people/1",
    });
  });
});

describe("error reporting", () => {
  it("reports unclassified exceptions and echoes the tracking token", async () => {
    const reporter: ErrorReporter = { report: vi.fn(() => REPORT_TOKEN) };
    const boom = new Error("uncaught");
    const { fetch } = await start({
      reporter,
      templatePath: TEMPLATES,
      errorTemplate: "error.html",
      people: failingPeople(boom),
    });
    const res = await fetch("/people", { headers: { ...HTML, "X-Request-Id": "req-boom" } });
    expect(res.status).toBe(500);
    expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");
    expect(res.headers.get("x-sentry-event-id")).toMatch(UUID_PATTERN);
    const body = await res.text();
    expect(body).toContain("Your custom error page for 500");
    expect(body).toContain(`<p>Reference: ${REPORT_TOKEN}</p>`);
    expect(reporter.report).toHaveBeenCalledWith(
      boom,
      expect.objectContaining({ payload: { id: "req-boom" }, request: expect.objectContaining({ method: "GET", url: "/people" }) })
    );
  });

  it("puts the token in the JSON error payload", async () => {
    const reporter: ErrorReporter = { report: () => REPORT_TOKEN };
    const { fetch } = await start({ reporter, people: failingPeople(new Error("uncaught")) });
    const res = await fetch("/people");
    const body = await res.json();
    expect(body.error).toEqual({
      forHuman: "Internal Server Error",
      forRobot: "uncaught",
      uri: "/people",
      reportId: REPORT_TOKEN,
    });
  });

  it("does not report client errors", async () => {
    const reporter: ErrorReporter = { report: vi.fn(() => REPORT_TOKEN) };
    const { fetch } = await start({ reporter });
    const res = await fetch("/people/private");
    expect(res.status).toBe(401);
    expect(res.headers.get("x-sentry-event-id")).toBeNull();
    expect(reporter.report).not.toHaveBeenCalled();
  });

  it("keeps the original response when the reporter fails", async () => {
    const reporter: ErrorReporter = {
      report: () => {
        throw new Error("collector unreachable");
      },
    };
    const { fetch, records } = await start({ reporter, people: failingPeople(new Error("uncaught")) });
    const res = await fetch("/people");
    expect(res.status).toBe(500);
    expect(res.headers.get("x-sentry-event-id")).toBeNull();
    expect(records.find((r) => r.during === "error-report")).toMatchObject({ level: 50, error: "collector unreachable" });
  });
});

describe("request log", () => {
  it("emits one record per request with scrubbed uri", async () => {
    const { fetch, records } = await start();
    await fetch("/people?limit=1&token=abc123", { headers: { "X-Request-Id": "req-log" } });
    await vi.waitFor(() => expect(requestRecord(records, "/people?limit=1&token=***")).toBeDefined());
    expect(requestRecord(records, "/people?limit=1&token=***")).toMatchObject({
      level: 30,
      msg: "GET 200",
      id: "req-log",
      status: 200,
      method: "GET",
      reason: "OK",
    });
  });

  it("routes records by status", async () => {
    const { fetch, records } = await start({ people: failingPeople(new Error("uncaught")) });
    await fetch("/nope");
    await fetch("/people");
    await vi.waitFor(() => expect(requestRecord(records, "/people")).toBeDefined());
    await vi.waitFor(() => expect(requestRecord(records, "/nope")).toBeDefined());
    expect(requestRecord(records, "/nope")?.level).toBe(40);
    expect(requestRecord(records, "/people")?.level).toBe(60);
  });

  it("includes the handler payload", async () => {
    const { fetch, records } = await start({ getLogPayload: (req) => ({ id: req.context.id, user: "tester" }) });
    await fetch("/healthz");
    await vi.waitFor(() => expect(requestRecord(records, "/healthz")).toBeDefined());
    expect(requestRecord(records, "/healthz")).toMatchObject({ user: "tester", status: 200 });
  });

  it("skips static files", async () => {
    const { fetch, records } = await start({ staticRoot: PUBLIC_DIR });
    const file = await fetch("/static/hello.txt");
    expect(await file.text()).toBe("hello from disk\n");
    await fetch("/healthz");
    await vi.waitFor(() => expect(requestRecord(records, "/healthz")).toBeDefined());
    expect(requestRecord(records, "/static/hello.txt")).toBeUndefined();
  });
});

describe("settings", () => {
  it("requires templatePath alongside errorTemplate", () => {
    const { logging } = captureLogging();
    expect(() => createApp({ logging, errorTemplate: "error.html" })).toThrow(
      "settings `templatePath` must be set to use a custom `errorTemplate`"
    );
  });
});
