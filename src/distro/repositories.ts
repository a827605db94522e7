// Official repository lines per distro. Adding a distro requires: (1) a new variant in
// DistroRepository, (2) a new case here, and (3) a detection rule in detector.ts.
import type { DistroKind, DistroRepository } from "../types/distro.js";
import { ReconcileError, ReconcileErrorCode } from "../shared/errors.js";

const DEBIAN_COMPONENTS = "main contrib non-free non-free-firmware";
const UBUNTU_COMPONENTS = "main restricted universe multiverse";

export function repositoryLines(distro: DistroRepository): string[] {
  switch (distro.kind) {
    case "kali":
      return [`deb http://http.kali.org/kali kali-rolling ${DEBIAN_COMPONENTS}`];
    case "debian":
      return [
        `deb http://deb.debian.org/debian ${distro.codename} ${DEBIAN_COMPONENTS}`,
        `deb http://deb.debian.org/debian ${distro.codename}-updates ${DEBIAN_COMPONENTS}`,
        `deb http://security.debian.org/debian-security ${distro.codename}-security ${DEBIAN_COMPONENTS}`,
      ];
    case "ubuntu":
      return [
        `deb http://archive.ubuntu.com/ubuntu ${distro.codename} ${UBUNTU_COMPONENTS}`,
        `deb http://archive.ubuntu.com/ubuntu ${distro.codename}-updates ${UBUNTU_COMPONENTS}`,
        `deb http://security.ubuntu.com/ubuntu ${distro.codename}-security ${UBUNTU_COMPONENTS}`,
      ];
    default: {
      const unknown: never = distro;
      throw new ReconcileError(ReconcileErrorCode.UNSUPPORTED_DISTRO, `Unsupported distro: ${JSON.stringify(unknown)}`);
    }
  }
}

export interface DebLine {
  readonly uri: string;
  readonly suite: string;
  readonly components: string[];
}

/** Fields of a one-line `deb` entry; null for deb-src, comments and anything else. */
export function parseDebLine(line: string): DebLine | null {
  const tokens = line.replace(/#.*$/, "").trim().split(/\s+/);
  if (tokens[0] !== "deb") return null;
  let i = 1;
  if (tokens[i]?.startsWith("[")) {
    while (i < tokens.length && !tokens[i]?.endsWith("]")) i++;
    i++;
  }
  const [uri, suite, ...components] = tokens.slice(i);
  if (uri === undefined || suite === undefined) return null;
  return { uri, suite, components };
}

/** Last path segment of an archive URI: "kali", "debian", "debian-security", "ubuntu". */
function archiveOf(uri: string): string {
  return uri.replace(/\/+$/, "").split("/").pop() ?? "";
}

/**
 * An active line provides an official one when it is a `deb` entry for the same suite of
 * the same archive sharing at least one component. Mirrors, https, [options] blocks and
 * component subsets all count.
 */
export function providesRepository(line: string, official: string): boolean {
  const have = parseDebLine(line);
  const want = parseDebLine(official);
  if (!have || !want) return false;
  return have.suite === want.suite
    && archiveOf(have.uri) === archiveOf(want.uri)
    && have.components.some((c) => want.components.includes(c));
}

/** Build a DistroRepository from loose input; Debian and Ubuntu need a codename. */
export function toDistroRepository(kind: DistroKind, codename?: string): DistroRepository {
  switch (kind) {
    case "kali":
      return { kind };
    case "debian":
    case "ubuntu":
      if (!codename) {
        throw new ReconcileError(ReconcileErrorCode.UNSUPPORTED_DISTRO, `A codename is required for ${kind}`, { kind });
      }
      return { kind, codename };
  }
}
