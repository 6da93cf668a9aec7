import { accessSync, constants, existsSync } from "node:fs";
import { loadConfig } from "../config/loader.js";
import type { ParleyConfig } from "../config/types.js";
import { createLogger } from "../infra/logger.js";
import { SessionStore } from "../sessions/store.js";

const log = createLogger("doctor");

export interface DoctorCheck {
  name: string;
  status: "pass" | "warn" | "fail";
  message: string;
}

export interface DoctorReport {
  checks: DoctorCheck[];
  ok: boolean;
}

const MIN_NODE_MAJOR = 20;

/**
 * Run all doctor diagnostic checks and return a report.
 */
export async function runDoctorChecks(
  configPath: string,
  env: Record<string, string | undefined> = process.env,
  nodeVersion: string = process.version,
): Promise<DoctorReport> {
  const checks: DoctorCheck[] = [checkNodeVersion(nodeVersion)];

  let config: ParleyConfig | null = null;
  try {
    config = await loadConfig(configPath, env);
    checks.push(
      existsSync(configPath)
        ? { name: "Config file", status: "pass", message: `Config file is valid: ${configPath}` }
        : {
            name: "Config file",
            status: "warn",
            message: `Config file not found: ${configPath} (using defaults)`,
          },
    );
  } catch (err) {
    checks.push({
      name: "Config file",
      status: "fail",
      message: err instanceof Error ? err.message : String(err),
    });
  }

  if (config) {
    const dirCheck = checkSessionsDirectory(config.memory.sessionDir);
    checks.push(dirCheck);
    if (dirCheck.status === "pass") {
      checks.push(checkSessionFiles(config.memory.sessionDir));
    }
  }

  const ok = checks.every((c) => c.status !== "fail");
  return { checks, ok };
}

export function checkNodeVersion(version: string): DoctorCheck {
  const match = version.match(/^v(\d+)\./);
  if (!match?.[1]) {
    return {
      name: "Node version",
      status: "fail",
      message: `Unable to parse Node.js version: ${version}`,
    };
  }

  const major = parseInt(match[1], 10);
  if (major >= MIN_NODE_MAJOR) {
    return {
      name: "Node version",
      status: "pass",
      message: `Node.js ${version} >= v${MIN_NODE_MAJOR}.0.0`,
    };
  }

  return {
    name: "Node version",
    status: "fail",
    message: `Node.js ${version} is below minimum v${MIN_NODE_MAJOR}.0.0`,
  };
}

function checkSessionsDirectory(dir: string): DoctorCheck {
  if (!existsSync(dir)) {
    return {
      name: "Sessions directory",
      status: "warn",
      message: `${dir} does not exist (will be created on first save)`,
    };
  }

  try {
    accessSync(dir, constants.W_OK);
    return {
      name: "Sessions directory",
      status: "pass",
      message: `${dir} exists and is writable`,
    };
  } catch {
    return {
      name: "Sessions directory",
      status: "fail",
      message: `${dir} exists but is not writable`,
    };
  }
}

/**
 * Load every saved session and report ones with unusable lines.
 */
function checkSessionFiles(dir: string): DoctorCheck {
  const store = new SessionStore(dir);
  const names = store.list();
  const damaged: string[] = [];

  for (const name of names) {
    try {
      const { skipped } = store.load(name);
      if (skipped > 0) damaged.push(`${name} (${skipped} skipped)`);
    } catch (err) {
      log.debug(`Could not load session ${name}: ${err instanceof Error ? err.message : String(err)}`);
      damaged.push(`${name} (unreadable)`);
    }
  }

  if (damaged.length === 0) {
    return {
      name: "Session files",
      status: "pass",
      message: `${names.length} session(s) load cleanly`,
    };
  }

  return {
    name: "Session files",
    status: "warn",
    message: `Sessions with unusable lines: ${damaged.join(", ")}`,
  };
}

/**
 * Format a doctor report as human-readable text.
 * Uses [PASS], [WARN], [FAIL] prefixes.
 */
export function formatDoctorResults(report: DoctorReport): string {
  const lines = report.checks.map((check) => {
    const prefix =
      check.status === "pass"
        ? "[PASS]"
        : check.status === "warn"
          ? "[WARN]"
          : "[FAIL]";
    return `${prefix} ${check.name}: ${check.message}`;
  });

  lines.push("");
  lines.push(
    report.ok ? "All checks passed." : "Some checks failed. See above.",
  );

  return lines.join("\n");
}
