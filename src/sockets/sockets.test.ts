import { afterEach, describe, test, expect } from "vitest";
import { connect, createServer, type Server, type Socket } from "node:net";
import { ExitCode } from "@/diagnostics/exitCodes.ts";
import { readBounded, writeAll } from "./boundedIO.ts";

type SocketPair = { server: Socket; client: Socket; listener: Server };

const pairs: SocketPair[] = [];

const createSocketPair = async (): Promise<SocketPair> => {
  const listener = createServer({ allowHalfOpen: true });
  await new Promise<void>((resolve) => listener.listen(0, "127.0.0.1", () => resolve()));
  const address = listener.address();
  if (address === null || typeof address === "string") throw new Error("listener has no port");

  const accepted = new Promise<Socket>((resolve) => listener.once("connection", resolve));
  const client = connect(address.port, "127.0.0.1");
  client.on("error", () => {});
  const server = await accepted;
  server.on("error", () => {});

  const pair = { server, client, listener };
  pairs.push(pair);
  return pair;
};

const collect = (socket: Socket): Promise<string> =>
  new Promise((resolve) => {
    const chunks: Buffer[] = [];
    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    socket.on("close", () => resolve(Buffer.concat(chunks).toString("latin1")));
  });

afterEach(async () => {
  for (const { server, client, listener } of pairs.splice(0)) {
    server.destroy();
    client.destroy();
    await new Promise<void>((resolve) => listener.close(() => resolve()));
  }
});

describe("readBounded", () => {
  test("reads until the peer ends its side", async () => {
    const { server, client } = await createSocketPair();
    client.end("GET /abc");
    const data = await readBounded(server, { min: 5, max: 100, timeoutMs: 1000 });
    expect(data.toString("latin1")).toBe("GET /abc");
  });

  test("stops once max bytes have arrived", async () => {
    const { server, client } = await createSocketPair();
    client.write("GET /abcdefghij");
    const data = await readBounded(server, { min: 5, max: 8, timeoutMs: 1000 });
    expect(data.toString("latin1")).toBe("GET /abc");
  });

  test("reports a short request as a weird length", async () => {
    const { server, client } = await createSocketPair();
    client.end("GE");
    await expect(readBounded(server, { min: 5, max: 100, timeoutMs: 1000 })).rejects.toMatchObject({
      code: ExitCode.WEIRD_RX_LENGTH,
      scope: "connection",
    });
  });

  test("reports a silent peer as an I/O error", async () => {
    const { server } = await createSocketPair();
    await expect(readBounded(server, { min: 5, max: 100, timeoutMs: 50 })).rejects.toMatchObject({
      code: ExitCode.SOCKET_READ_FAILED,
      message: "read(): timed out after 50ms",
    });
  });
});

describe("writeAll", () => {
  test("writes every byte", async () => {
    const { server, client } = await createSocketPair();
    const received = collect(client);
    const payload = Buffer.alloc(256 * 1024, 0x7a);

    await expect(writeAll(server, payload, { timeoutMs: 1000 })).resolves.toBe(payload.length);
    server.end();
    const text = await received;
    expect(text.length).toBe(payload.length);
    expect(text).toBe("z".repeat(payload.length));
  });

  test("reports a closed socket as a short write", async () => {
    const { server } = await createSocketPair();
    server.destroy();
    await expect(writeAll(server, Buffer.from("late"), { timeoutMs: 1000 })).rejects.toMatchObject({
      code: ExitCode.WEIRD_TX_LENGTH,
    });
  });
});
