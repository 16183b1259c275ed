import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { formatISO, fromUnixTime } from "date-fns";
import { z } from "zod";
import packageJson from "../package.json" with { type: "json" };
import { workSeconds, restSeconds } from "./config.js";
import { describePhase } from "./phase.js";
import type { PomodoroService } from "./pomodoro.js";
import type { PomodoroStatus } from "./types.js";

export interface PomodoroServerContext {
  server: McpServer;
  service: PomodoroService;
}

const pomodoroInputSchema = z.object({
  action: z.enum(["start", "stop", "status"]).default("status")
});

export function createPomodoroServer(service: PomodoroService): PomodoroServerContext {
  const server = new McpServer(
    {
      name: "marinara",
      version: packageJson.version
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  server.registerTool(
    "pomodoro",
    {
      title: "Pomodoro",
      description: "Start or stop the pomodoro timer, or report which phase it is in.",
      inputSchema: {
        action: z
          .enum(["start", "stop", "status"])
          .optional()
          .describe('Defaults to "status".')
      },
      annotations: {
        readOnlyHint: false
      }
    },
    async input => {
      const parsed = pomodoroInputSchema.parse(input);

      switch (parsed.action) {
        case "start": {
          const status = await service.start();
          const work = formatDurationFromSeconds(workSeconds(status.config));
          const rest = formatDurationFromSeconds(restSeconds(status.config));
          return buildResult(`Started a pomodoro: ${work} of work, then ${rest} of rest.`, status);
        }
        case "stop": {
          const wasRunning = await service.stop();
          const status = await service.status();
          return buildResult(wasRunning ? "Stopped the pomodoro." : "No pomodoro was running.", status);
        }
        case "status":
        default: {
          const status = await service.status();
          return buildResult(describePhase(status.phase), status);
        }
      }
    }
  );

  return {
    server,
    service
  };
}

function buildResult(message: string, status: PomodoroStatus) {
  return {
    content: [
      {
        type: "text" as const,
        text: message
      }
    ],
    structuredContent: buildStructuredContent(status)
  };
}

function buildStructuredContent(status: PomodoroStatus): Record<string, unknown> {
  const { phase } = status;
  return {
    phase: phase.kind,
    ...(phase.kind === "work" || phase.kind === "rest" ? { remainingSeconds: phase.remaining } : {}),
    display: status.text,
    ...(status.startedAt !== undefined ? { startedAt: formatISO(fromUnixTime(status.startedAt)) } : {})
  };
}

export function formatDurationFromSeconds(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  const parts: string[] = [];

  if (minutes > 0) {
    parts.push(`${minutes} minute${minutes === 1 ? "" : "s"}`);
  }
  if (seconds > 0) {
    parts.push(`${seconds} second${seconds === 1 ? "" : "s"}`);
  }

  if (parts.length === 0) {
    return "0 seconds";
  }

  if (parts.length === 1) {
    return parts[0];
  }

  return `${parts[0]} and ${parts[1]}`;
}
