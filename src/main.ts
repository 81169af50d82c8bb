#!/usr/bin/env node
/**
 * CLI entry point.
 *
 *   voice-reply respond <text> [--session id] [--force] [--notice]
 *   voice-reply turn <audio-file> --reply <text> [--language yue]
 *   voice-reply asr <audio-file> [--language yue]
 *   voice-reply tts <text> [--output file.wav]
 *   voice-reply status | enable | disable | toggle [--session id]
 */

import * as fs from "fs";
import * as path from "path";
import { parseArgs } from "util";
import { loadConfig } from "./config";
import { createApp, type App } from "./app";
import { StreamDeliveryChannel, toPayload } from "./delivery/channel";
import { FileArtifactSink } from "./delivery/artifacts";
import { SynthesisGuard } from "./voice/synthesis-guard";
import { logger, logError } from "./logging";

const USAGE = `usage: voice-reply <respond|turn|asr|tts|status|enable|disable|toggle> [args]
  --session <id>    session key (default: $VOICE_SESSION_ID or "default")
  --force           synthesize even when voice output is off
  --notice          append a notice when audio timed out, failed or was shortened
  --reply <text>    agent reply for "turn"
  --language <code> recognition language (default: VOICE_DEFAULT_LANGUAGE)
  --output <file>   destination for "tts"`;

function print(line: string): void {
  process.stdout.write(line + "\n");
}

function formatOf(file: string): string {
  return path.extname(file).replace(/^\./, "").toLowerCase() || "wav";
}

async function run(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      session: { type: "string" },
      force: { type: "boolean", default: false },
      notice: { type: "boolean", default: false },
      reply: { type: "string" },
      language: { type: "string" },
      output: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  const [command, ...rest] = positionals;
  if (values.help || !command) {
    print(USAGE);
    return command ? 0 : 2;
  }

  const app: App = createApp(loadConfig());
  const sessionId = values.session ?? process.env.VOICE_SESSION_ID ?? "default";
  const session = app.sessions.session(sessionId);
  const channel = new StreamDeliveryChannel();

  switch (command) {
    case "respond": {
      const text = rest.join(" ");
      const result = await app.sessions.respond(sessionId, text, { force: values.force });
      if (!result.success) {
        print(`error: ${result.error ?? "respond failed"}`);
        return 1;
      }
      await channel.deliver(toPayload(result, values.notice));
      return 0;
    }
    case "turn": {
      const file = rest[0];
      if (!file || values.reply === undefined) {
        print('error: "turn" needs an audio file and --reply');
        return 2;
      }
      const audio = await fs.promises.readFile(file);
      const turn = await app.sessions.conversationTurn(sessionId, audio, values.reply, {
        transcribe: { language: values.language, format: formatOf(file) },
        respond: { force: values.force },
      });
      print(`heard: ${turn.transcription.text || `(${turn.transcription.action})`}`);
      if (turn.response) await channel.deliver(toPayload(turn.response, values.notice));
      if (!turn.success) print(`error: ${turn.error ?? "turn failed"}`);
      return turn.success ? 0 : 1;
    }
    case "asr": {
      const file = rest[0];
      if (!file) {
        print('error: "asr" needs an audio file');
        return 2;
      }
      const audio = await fs.promises.readFile(file);
      const result = await app.sessions.transcribe(sessionId, audio, { language: values.language, format: formatOf(file) });
      if (!result.success) {
        print(`error: ${result.error ?? "recognition failed"}`);
        return 1;
      }
      print(result.text || `(${result.action})`);
      print(`language: ${result.language ?? "?"}  duration: ${result.durationSec.toFixed(2)}s`);
      return 0;
    }
    case "tts": {
      const text = rest.join(" ");
      if (!text.trim()) {
        print('error: "tts" needs text');
        return 2;
      }
      const guard = new SynthesisGuard(app.tts, { languageCode: app.config.voice.defaultLanguage, speakingRate: app.config.tts.speakingRate });
      const outcome = await guard.synthesizeWithTimeout(text, app.config.voice.timeoutSeconds * 1000);
      if (!outcome.success) {
        print(`error: ${outcome.error}${outcome.timedOut ? " (timed out)" : ""}`);
        return 1;
      }
      const artifact = await new FileArtifactSink(app.config.voice.outputDir).save(outcome.speech, { path: values.output });
      print(`${artifact.uri} (${artifact.durationSec.toFixed(2)}s)`);
      return 0;
    }
    case "status":
      print(await session.orchestrator.statusInfo());
      return 0;
    case "enable":
      await session.run((o) => o.enableVoice());
      print(await session.orchestrator.statusInfo());
      return 0;
    case "disable":
      await session.run((o) => o.disableVoice());
      print(await session.orchestrator.statusInfo());
      return 0;
    case "toggle":
      await session.run((o) => o.toggleVoice());
      print(await session.orchestrator.statusInfo());
      return 0;
    default:
      print(`unknown command: ${command}\n${USAGE}`);
      return 2;
  }
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logError(logger, err instanceof Error ? err : new Error(String(err)));
      process.exit(1);
    });
}

export { run };
