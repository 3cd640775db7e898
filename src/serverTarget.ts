import fs from "fs";
import path from "path";
import { UsageError } from "./shared/errors";

export type TransportKind = "stdio" | "http" | "sse";
export type TransportPreference = TransportKind | "auto";

export type ServerTarget =
  | {
      transport: "stdio";
      command: string;
      args: string[];
      scriptPath: string;
    }
  | {
      transport: "http" | "sse";
      url: string;
    };

function isHttpUrl(server: string): boolean {
  return server.startsWith("http://") || server.startsWith("https://");
}

export function inferTransport(server: string, preference: TransportPreference = "auto"): TransportKind {
  if (preference !== "auto") return preference;
  if (isHttpUrl(server)) {
    return server.includes("/sse") ? "sse" : "http";
  }
  return "stdio";
}

export function pythonCommand(platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? "python" : "python3";
}

export function describeTarget(target: ServerTarget): string {
  return target.transport === "stdio" ? target.scriptPath : target.url;
}

export function resolveServerTarget(
  server: string,
  preference: TransportPreference = "auto",
  fileExists: (candidate: string) => boolean = fs.existsSync
): ServerTarget {
  const transport = inferTransport(server, preference);

  if (transport === "stdio") {
    if (!fileExists(server)) {
      throw new UsageError(`Server script not found: ${server}`);
    }
    const extension = path.extname(server).toLowerCase();
    if (extension !== ".py" && extension !== ".js") {
      throw new UsageError(`Server script must be a .py or .js file: ${server}`);
    }
    return {
      transport,
      command: extension === ".py" ? pythonCommand() : process.execPath,
      args: [server],
      scriptPath: server,
    };
  }

  try {
    return { transport, url: new URL(server).toString() };
  } catch {
    throw new UsageError(`Invalid server URL: ${server}`);
  }
}
