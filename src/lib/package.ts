import fs from "node:fs";
import path from "node:path";
import { isRecord } from "./utils";

interface PackageMeta {
  name?: string;
  version?: string;
}

export function readPackageMeta(): PackageMeta {
  // Sources live in src/lib, tsc output in dist/src/lib, the bundle in dist/bundle.
  const candidates = [
    path.resolve(__dirname, "../../package.json"),
    path.resolve(__dirname, "../../../package.json"),
    path.resolve(__dirname, "../package.json")
  ];

  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) {
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(candidate, "utf8"));
    } catch {
      continue;
    }
    if (isRecord(parsed)) {
      return {
        name: typeof parsed.name === "string" ? parsed.name : undefined,
        version: typeof parsed.version === "string" ? parsed.version : undefined
      };
    }
  }

  return {};
}
