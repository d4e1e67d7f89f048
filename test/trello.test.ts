import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as http from "http";
import * as os from "os";
import * as path from "path";
import { Readable } from "stream";
import axios from "axios";
import { TrelloIntegration } from "../src/trello";
import { AuthError, DownloadError, NetworkError, NotFoundError } from "../src/errors";

// In-process stand-in for the Trello API, bound to loopback

interface RecordedRequest {
  pathname: string;
  params: URLSearchParams;
}

const requests: RecordedRequest[] = [];
let server: http.Server;
let baseUrl: string;
let origin: string;

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendText(res: http.ServerResponse, status: number, body: string): void {
  res.writeHead(status, { "Content-Type": "text/plain" });
  res.end(body);
}

function handle(req: http.IncomingMessage, res: http.ServerResponse): void {
  const url = new URL(req.url ?? "/", "http://127.0.0.1");
  requests.push({ pathname: url.pathname, params: url.searchParams });

  if (url.searchParams.get("key") !== "test-key" || url.searchParams.get("token") !== "test-token") {
    sendText(res, 401, "invalid key");
    return;
  }

  switch (url.pathname) {
    case "/1/boards/board-1":
      sendJson(res, 200, { id: "board-1", name: "Test Board", desc: "", url: "https://trello.example/b/board-1" });
      return;
    case "/1/boards/board-1/lists":
      sendJson(res, 200, [
        { id: "list-1", name: "Travel" },
        { id: "list-2", name: "Ideas" },
      ]);
      return;
    case "/1/lists/list-1/cards":
      sendJson(res, 200, [{ id: "card-1", name: "Trip", labels: [{ name: "Fun" }] }]);
      return;
    case "/1/lists/list-2/cards":
      sendJson(res, 200, [
        { id: "card-2", name: "Thought" },
        { id: "card-3", name: "Plan" },
      ]);
      return;
    case "/1/boards/bad-format":
      sendText(res, 400, "invalid id");
      return;
    case "/1/boards/flaky":
      sendText(res, 502, "bad gateway");
      return;
    case "/files/photo.jpg":
      res.writeHead(200, { "Content-Type": "image/jpeg" });
      res.end(Buffer.from("jpeg-bytes"));
      return;
    case "/files/broken.png":
      sendText(res, 500, "server error");
      return;
    case "/files/late.jpg":
      setTimeout(() => {
        res.writeHead(200, { "Content-Type": "image/jpeg" });
        res.end(Buffer.from("late-bytes"));
      }, 150);
      return;
    default:
      sendText(res, 404, "The requested resource was not found.");
  }
}

async function startServer(handler: http.RequestListener): Promise<{ server: http.Server; origin: string }> {
  const started = http.createServer(handler);
  await new Promise<void>(resolve => started.listen(0, "127.0.0.1", resolve));
  const address = started.address();
  if (address === null || typeof address === "string") {
    throw new Error("Test server has no port");
  }
  return { server: started, origin: `http://127.0.0.1:${address.port}` };
}

async function stopServer(stopping: http.Server): Promise<void> {
  stopping.closeAllConnections();
  await new Promise<void>(resolve => stopping.close(() => resolve()));
}

function openConnections(counted: http.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    counted.getConnections((error, count) => (error ? reject(error) : resolve(count)));
  });
}

beforeAll(async () => {
  ({ server, origin } = await startServer(handle));
  baseUrl = `${origin}/1`;
});

afterAll(async () => {
  await stopServer(server);
});

let tmpDir: string;

beforeEach(() => {
  requests.length = 0;
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "trello-test-"));
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function client(): TrelloIntegration {
  return new TrelloIntegration("test-key", "test-token", baseUrl);
}

// ── constructor ─────────────────────────────────────────────────────

describe("TrelloIntegration", () => {
  it("should require both a key and a token", () => {
    expect(() => new TrelloIntegration("", "test-token", baseUrl)).toThrow(AuthError);
    expect(() => new TrelloIntegration("test-key", "", baseUrl)).toThrow(AuthError);
  });
});

// ── getBoard ────────────────────────────────────────────────────────

describe("getBoard", () => {
  it("should return board metadata and send credentials as query params", async () => {
    const board = await client().getBoard("board-1");

    expect(board).toEqual({ id: "board-1", name: "Test Board", desc: "", url: "https://trello.example/b/board-1" });
    expect(requests).toHaveLength(1);
    expect(requests[0].params.get("fields")).toBe("name,desc,url");
    expect(requests[0].params.get("key")).toBe("test-key");
    expect(requests[0].params.get("token")).toBe("test-token");
  });

  it("should raise AuthError on rejected credentials", async () => {
    const bad = new TrelloIntegration("wrong-key", "test-token", baseUrl);

    await expect(bad.getBoard("board-1")).rejects.toBeInstanceOf(AuthError);
  });

  it("should raise NotFoundError for an unknown board", async () => {
    await expect(client().getBoard("missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("should treat a malformed id as not found", async () => {
    await expect(client().getBoard("bad-format")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("should raise NetworkError on other failing statuses", async () => {
    const error = await client().getBoard("flaky").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toHaveProperty("message", "Request to /boards/flaky failed with status 502: bad gateway");
  });

  it("should raise NetworkError when the server is unreachable", async () => {
    const closed = http.createServer();
    await new Promise<void>(resolve => closed.listen(0, "127.0.0.1", resolve));
    const address = closed.address();
    await new Promise<void>(resolve => closed.close(() => resolve()));
    if (address === null || typeof address === "string") {
      throw new Error("Closed server has no port");
    }

    const unreachable = new TrelloIntegration("test-key", "test-token", `http://127.0.0.1:${address.port}/1`);

    await expect(unreachable.getBoard("board-1")).rejects.toBeInstanceOf(NetworkError);
  });
});

// ── getAllCardsOnBoard ──────────────────────────────────────────────

describe("getAllCardsOnBoard", () => {
  it("should concatenate cards in list order and annotate their list", async () => {
    const { lists, cards } = await client().getAllCardsOnBoard("board-1");

    expect(lists.map(l => l.id)).toEqual(["list-1", "list-2"]);
    expect(cards.map(c => [c.id, c.listId, c.listName])).toEqual([
      ["card-1", "list-1", "Travel"],
      ["card-2", "list-2", "Ideas"],
      ["card-3", "list-2", "Ideas"],
    ]);
    expect(cards[0].labels).toEqual([{ name: "Fun" }]);
  });

  it("should ask only for open lists and cards by default", async () => {
    await client().getAllCardsOnBoard("board-1");

    expect(requests.map(r => [r.pathname, r.params.get("filter")])).toEqual([
      ["/1/boards/board-1/lists", "open"],
      ["/1/lists/list-1/cards", "open"],
      ["/1/lists/list-2/cards", "open"],
    ]);
  });

  it("should ask for archived items when requested", async () => {
    await client().getAllCardsOnBoard("board-1", true);

    expect(requests.every(r => r.params.get("filter") === "all")).toBe(true);
  });

  it("should request labels and attachments with each card", async () => {
    await client().getCards("list-1");

    const params = requests[0].params;
    expect(params.get("fields")).toBe("name,desc,dateLastActivity,due,labels,closed");
    expect(params.get("attachments")).toBe("true");
    expect(params.get("attachment_fields")).toBe("name,url,mimeType,date");
  });
});

// ── downloadAttachment ──────────────────────────────────────────────

describe("downloadAttachment", () => {
  it("should stream the file to disk, creating directories", async () => {
    const saveTo = path.join(tmpDir, "card-1", "nested", "photo.jpg");

    const saved = await client().downloadAttachment(`${origin}/files/photo.jpg`, saveTo);

    expect(saved).toBe(saveTo);
    expect(fs.readFileSync(saveTo, "utf-8")).toBe("jpeg-bytes");
    expect(requests[0].params.get("key")).toBe("test-key");
  });

  it("should raise DownloadError and leave nothing behind on failure", async () => {
    const saveTo = path.join(tmpDir, "card-1", "broken.png");
    const url = `${origin}/files/broken.png`;

    const error = await client().downloadAttachment(url, saveTo).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DownloadError);
    expect(error).toHaveProperty("url", url);
    expect(fs.existsSync(saveTo)).toBe(false);
  });

  it("should close the connection when a failed download leaves its body open", async () => {
    // 500 with a partial body that never ends
    const stalled = await startServer((_req, res) => {
      res.writeHead(500, { "Content-Type": "text/plain" });
      res.write("partial");
    });
    const url = `${stalled.origin}/files/stalled.png`;

    try {
      const error = await client().downloadAttachment(url, path.join(tmpDir, "stalled.png")).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadError);
      const cause = error instanceof DownloadError ? error.cause : undefined;
      const body: unknown = axios.isAxiosError(cause) ? cause.response?.data : undefined;
      expect(body).toBeInstanceOf(Readable);
      expect(body instanceof Readable && body.destroyed).toBe(true);
      await vi.waitFor(async () => expect(await openConnections(stalled.server)).toBe(0), {
        timeout: 2000,
        interval: 20,
      });
    } finally {
      await stopServer(stalled.server);
    }
  });
});

// ── timeouts ────────────────────────────────────────────────────────

describe("timeouts", () => {
  let silent: { server: http.Server; origin: string };

  beforeAll(async () => {
    // accepts requests and never answers
    silent = await startServer(() => {});
  });

  afterAll(async () => {
    await stopServer(silent.server);
  });

  it("should raise NetworkError when a metadata request times out", async () => {
    const slow = new TrelloIntegration("test-key", "test-token", `${silent.origin}/1`, { metadataTimeoutMs: 50 });

    const error = await slow.getBoard("board-1").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toHaveProperty("message", "Request to /boards/board-1 timed out");
  });

  it("should raise DownloadError when a download times out", async () => {
    const slow = new TrelloIntegration("test-key", "test-token", baseUrl, { downloadTimeoutMs: 50 });
    const url = `${silent.origin}/files/slow.jpg`;
    const saveTo = path.join(tmpDir, "slow.jpg");

    const error = await slow.downloadAttachment(url, saveTo).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DownloadError);
    expect(error).toHaveProperty("message", `Failed to download ${url}: timeout of 50ms exceeded`);
    expect(fs.existsSync(saveTo)).toBe(false);
  });

  it("should time downloads separately from metadata requests", async () => {
    const patient = new TrelloIntegration("test-key", "test-token", baseUrl, {
      metadataTimeoutMs: 50,
      downloadTimeoutMs: 5000,
    });
    const saveTo = path.join(tmpDir, "late.jpg");

    await patient.downloadAttachment(`${origin}/files/late.jpg`, saveTo);

    expect(fs.readFileSync(saveTo, "utf-8")).toBe("late-bytes");
  });
});
