import { expect, test } from "vitest";
import { splitHostPort } from "./client-address.ts";

test("splitHostPort - IPv4 address", () => {
  expect(splitHostPort("203.0.113.7:51234")).toEqual({
    ok: true,
    host: "203.0.113.7",
    port: "51234",
  });
});

test("splitHostPort - bracketed IPv6 address drops the brackets", () => {
  expect(splitHostPort("[2001:db8::1]:443")).toEqual({
    ok: true,
    host: "2001:db8::1",
    port: "443",
  });
});

test("splitHostPort - hostname with empty port", () => {
  expect(splitHostPort("localhost:")).toEqual({
    ok: true,
    host: "localhost",
    port: "",
  });
});

test("splitHostPort - rejects malformed addresses", () => {
  const cases: Array<[string, string]> = [
    ["", "missing port in address"],
    ["203.0.113.7", "missing port in address"],
    ["::1:80", "too many colons in address"],
    ["[::1]", "missing port in address"],
    ["[::1", "missing ']' in address"],
    ["[::1]]:80", "missing port in address"],
    ["[::1]:80:90", "too many colons in address"],
    ["a]b:80", "unexpected ']' in address"],
    ["a[b:80", "unexpected '[' in address"],
  ];

  for (const [address, reason] of cases) {
    expect(splitHostPort(address), address).toEqual({ ok: false, reason });
  }
});
