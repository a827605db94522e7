import { readFile } from "node:fs/promises";
import type { DistroRepository } from "../types/distro.js";
import { ReconcileError, ReconcileErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Parse /etc/os-release into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.match(/^([A-Z_]+)=(.*)$/);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

/** Resolve the repository identity of a Debian-family system from its os-release fields. */
export function detectDistroRepository(osRelease: Record<string, string>): DistroRepository {
  const id = (osRelease.ID ?? "").toLowerCase();
  const idLike = (osRelease.ID_LIKE ?? "").toLowerCase().split(/\s+/);
  const codename = osRelease.VERSION_CODENAME || undefined;

  if (id === "kali") return { kind: "kali" };
  if (id === "debian" && codename) return { kind: "debian", codename };
  // Ubuntu derivatives (Mint, Pop!_OS) name their base in UBUNTU_CODENAME.
  const ubuntuCodename = osRelease.UBUNTU_CODENAME || (id === "ubuntu" ? codename : undefined);
  if ((id === "ubuntu" || idLike.includes("ubuntu")) && ubuntuCodename) return { kind: "ubuntu", codename: ubuntuCodename };

  logger.warn({ id, idLike, codename }, "Unsupported distro for repository management");
  throw new ReconcileError(ReconcileErrorCode.UNSUPPORTED_DISTRO, `Cannot derive repositories for distro '${id || "unknown"}'`, { id, codename });
}

export async function readDistroRepository(path = "/etc/os-release"): Promise<DistroRepository> {
  return detectDistroRepository(parseOsRelease(await readFile(path, "utf-8")));
}
