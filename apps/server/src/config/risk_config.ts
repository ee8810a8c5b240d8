// Risk config SSOT loader.
//
// Contract:
// - SSOT files: config/risk/<profile>.json at the repo root (SAFEWAVE_REPO_ROOT or found upward)
// - config_hash: sha256(stableStringify(parsedJson)) with "sha256:" prefix
// - a file that fails RiskConfigV1Z is refused at startup (no partial defaults)

import fs from "node:fs";
import path from "node:path";

import { RiskConfigV1Z } from "@safewave/contracts";
import type { RiskConfigV1 } from "@safewave/contracts";

import { findUp, sha256Hex, stableStringify } from "../util";

export type LoadedRiskConfig = {
  profile: string;
  config: RiskConfigV1;
  config_hash: string;
};

export const PROFILE_RE = /^[A-Za-z0-9_-]{1,64}$/;
const DEFAULT_PROFILE_PATH = path.join("config", "risk", "default.json");

export class RiskConfigInvalid extends Error {
  public readonly profile: string;
  public readonly issues: string[];

  constructor(profile: string, issues: string[]) {
    super(`risk config "${profile}" invalid: ${issues.join("; ")}`);
    this.name = "RiskConfigInvalid";
    this.profile = profile;
    this.issues = issues;
  }
}

export function computeConfigHash(cfg: RiskConfigV1): string {
  return `sha256:${sha256Hex(stableStringify(cfg))}`;
}

export function parseRiskConfig(profile: string, raw: unknown): LoadedRiskConfig {
  const parsed = RiskConfigV1Z.safeParse(raw);
  if (!parsed.success) {
    throw new RiskConfigInvalid(
      profile,
      parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
    );
  }
  return { profile, config: parsed.data, config_hash: computeConfigHash(parsed.data) };
}

/**
 * Reads config/risk/<profile>.json under `repoRoot`, or under the nearest directory
 * above the working directory that has a default profile.
 */
export function loadRiskConfig(profile: string, repoRoot?: string): LoadedRiskConfig {
  if (!PROFILE_RE.test(profile)) throw new Error(`invalid config profile: ${profile}`);
  const root = repoRoot ? path.resolve(repoRoot) : findUp(process.cwd(), DEFAULT_PROFILE_PATH);
  const p = path.join(root, "config", "risk", `${profile}.json`);
  const raw: unknown = JSON.parse(fs.readFileSync(p, "utf8"));
  return parseRiskConfig(profile, raw);
}
