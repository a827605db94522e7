import { z } from "zod";
import { RISK_LEVELS } from "../types/risk.js";

const riskLevel = z.enum(RISK_LEVELS);

/** Configuration schema; every key has a default so a partial file is valid. */
export const configSchema = z.object({
  sources: z.object({
    main_list: z.string().min(1).default("/etc/apt/sources.list"),
    parts_dir: z.string().min(1).default("/etc/apt/sources.list.d"),
    // Marked lines must stay comments to APT, so the marker has to open with '#'.
    // ASCII only: it is inserted into files of unknown encoding.
    marker: z.string().regex(/^#[\x21-\x7e]+$/, "marker must be '#' followed by printable ASCII without whitespace").default("#dedup"),
  }).default({}),
  backup: z.object({
    root: z.string().min(1).default("/var/backups/apt-sources"),
  }).default({}),
  retry: z.object({
    max_attempts: z.number().int().min(1).default(3),
    backoff_seconds: z.number().min(0).default(2),
  }).default({}),
  lock: z.object({
    paths: z.array(z.string().min(1)).min(1).default([
      "/var/lib/dpkg/lock-frontend",
      "/var/lib/dpkg/lock",
      "/var/lib/apt/lists/lock",
      "/var/cache/apt/archives/lock",
    ]),
    timeout_seconds: z.number().positive().default(120),
    poll_interval_seconds: z.number().positive().default(3),
    grace_period_seconds: z.number().min(0).default(2),
  }).default({}),
  privilege: z.object({
    method: z.enum(["sudo", "none"]).default("sudo"),
  }).default({}),
  safety: z.object({
    confirmation_threshold: riskLevel.default("high"),
    dry_run_bypass_confirmation: z.boolean().default(true),
  }).default({}),
});
