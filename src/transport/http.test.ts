import { expect, test } from "vitest";
import { defaultAllowedHosts } from "./http";

test("default allowed hosts cover loopback and the bind host", () => {
  expect(defaultAllowedHosts("127.0.0.1", 3000)).toEqual([
    "127.0.0.1",
    "127.0.0.1:3000",
    "localhost",
    "localhost:3000",
  ]);
  expect(defaultAllowedHosts("0.0.0.0", 8080)).toEqual([
    "127.0.0.1",
    "127.0.0.1:8080",
    "localhost",
    "localhost:8080",
    "0.0.0.0",
    "0.0.0.0:8080",
  ]);
});
