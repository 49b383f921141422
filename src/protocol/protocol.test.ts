import { describe, test, expect } from "vitest";
import { ExitCode } from "@/diagnostics/exitCodes.ts";
import { ConnectionFatalError } from "@/diagnostics/errors.ts";
import { RequestParser } from "./requestParser.ts";
import { ResponseSerializer } from "./responseSerializer.ts";

const parse = (text: string) => RequestParser.parse(Buffer.from(text, "latin1"));

const failureCode = (text: string): number | null => {
  try {
    parse(text);
    return null;
  } catch (error) {
    return error instanceof ConnectionFatalError ? error.code : -1;
  }
};

describe("RequestParser", () => {
  test("extracts the path after the GET literal", () => {
    expect(parse("GET /docs/ HTTP/1.1\r\nHost: example\r\n\r\n")).toEqual({ method: "GET", path: "/docs/" });
    expect(parse("GET /")).toEqual({ method: "GET", path: "/" });
    expect(parse("GET /a\tb").path).toBe("/a");
  });

  test("skips extra delimiters before the path", () => {
    expect(parse("GET   /x y").path).toBe("/x");
  });

  test("rejects any other method literal", () => {
    expect(failureCode("POST / HTTP/1.1")).toBe(ExitCode.NON_GET_REQUEST);
    expect(failureCode("get / HTTP/1.1")).toBe(ExitCode.NON_GET_REQUEST);
    expect(failureCode("GET/ HTTP/1.1")).toBe(ExitCode.NON_GET_REQUEST);
  });

  test("rejects empty or relative paths", () => {
    expect(failureCode("GET      ")).toBe(ExitCode.WEIRD_REQUEST_PATH);
    expect(failureCode("GET index.html")).toBe(ExitCode.WEIRD_REQUEST_PATH);
  });

  test("sizes the read buffer from the longest route", () => {
    expect(RequestParser.maxRequestSize(10)).toBe(15);
    expect(RequestParser.maxRequestSize(0)).toBe(5);
  });
});

describe("ResponseSerializer", () => {
  test("writes the status line and Content-Length", () => {
    expect(ResponseSerializer.header("200 OK", 9).toString("latin1")).toBe("HTTP/1.1 200 OK\r\nContent-Length: 9\r\n\r\n");
  });

  test("builds the fixed fallback 404", () => {
    expect(ResponseSerializer.fallbackNotFound().toString("latin1")).toBe(
      "HTTP/1.1 404 NOT FOUND\r\nContent-Length: 13\r\n\r\n404 NOT FOUND",
    );
  });
});
