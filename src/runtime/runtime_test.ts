import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import { finished } from "node:stream/promises";
import { afterEach, beforeEach, expect, test } from "vitest";
import {
  collectBody,
  formatRemoteAddress,
  PayloadTooLargeError,
  readTextFile,
} from "./runtime.ts";

let dir = "";

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "marquee-runtime-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

test("formatRemoteAddress - IPv4 host and port", () => {
  expect(formatRemoteAddress("198.51.100.2", 5000)).toBe("198.51.100.2:5000");
});

test("formatRemoteAddress - IPv6 hosts are bracketed", () => {
  expect(formatRemoteAddress("2001:db8::7", 443)).toBe("[2001:db8::7]:443");
  expect(formatRemoteAddress("::ffff:127.0.0.1", 80)).toBe(
    "[::ffff:127.0.0.1]:80",
  );
});

test("formatRemoteAddress - unknown peer is empty", () => {
  expect(formatRemoteAddress(undefined, 80)).toBe("");
  expect(formatRemoteAddress("198.51.100.2", undefined)).toBe("");
});

test("readTextFile - returns file contents", async () => {
  const path = join(dir, "marquee.yaml");
  await writeFile(path, "port: 4100\n");

  expect(await readTextFile(path)).toBe("port: 4100\n");
});

test("readTextFile - missing file is null", async () => {
  expect(await readTextFile(join(dir, "absent.yaml"))).toBeNull();
});

test("readTextFile - other errors propagate", async () => {
  await expect(readTextFile(dir)).rejects.toThrow();
});

test("collectBody - joins chunks into one buffer", async () => {
  const body = await collectBody(
    Readable.from([Buffer.from("abc"), Buffer.from("def")]),
    null,
  );

  expect(body).toBeInstanceOf(ArrayBuffer);
  expect(new TextDecoder().decode(body)).toBe("abcdef");
});

test("collectBody - exactly at the limit is accepted", async () => {
  const body = await collectBody(Readable.from([Buffer.from("abcd")]), 4);

  expect(body.byteLength).toBe(4);
});

test("collectBody - over the limit rejects and keeps draining", async () => {
  const stream = Readable.from([
    Buffer.from("abc"),
    Buffer.from("def"),
    Buffer.from("ghi"),
  ]);

  await expect(collectBody(stream, 4)).rejects.toBeInstanceOf(
    PayloadTooLargeError,
  );
  await expect(finished(stream)).resolves.toBeUndefined();
});
