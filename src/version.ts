import fs from "node:fs";

function readVersion(): string {
  const parsed: unknown = JSON.parse(fs.readFileSync(new URL("../package.json", import.meta.url), "utf8"));
  if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
    return parsed.version;
  }
  return "0.0.0";
}

/** Application version from package.json. */
export const APP_VERSION: string = readVersion();
