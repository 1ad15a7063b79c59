import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import { ITextSink } from "../types/contracts";
import { binaryExists } from "../utils";

export interface ClipboardCommand {
  binary: string;
  args: string[];
}

/** The slice of `ChildProcess` needed to pipe text into a clipboard tool. */
export interface ClipboardProcess {
  readonly stdin: Writable | null;
  readonly stderr: Readable | null;
  once(event: "error", listener: (err: Error) => void): this;
  once(event: "close", listener: (code: number | null) => void): this;
}

interface ClipboardWriterDependencies {
  findCommand?: () => Promise<ClipboardCommand | undefined>;
  spawnProcess?: (command: ClipboardCommand) => ClipboardProcess;
}

export class ClipboardWriter implements ITextSink {
  private command?: ClipboardCommand;
  private lookupDone = false;
  private readonly findCommand: () => Promise<ClipboardCommand | undefined>;
  private readonly spawnProcess: (command: ClipboardCommand) => ClipboardProcess;

  constructor(deps: ClipboardWriterDependencies = {}) {
    this.findCommand = deps.findCommand ?? findClipboardCommand;
    this.spawnProcess =
      deps.spawnProcess ??
      ((command) => spawn(command.binary, command.args, { stdio: ["pipe", "ignore", "pipe"] }));
  }

  async insert(text: string): Promise<void> {
    if (!this.lookupDone) {
      this.command = await this.findCommand();
      this.lookupDone = true;
    }
    const command = this.command;
    if (!command) {
      throw new Error("No clipboard tool found (pbcopy, clip, wl-copy, xclip or xsel).");
    }

    const proc = this.spawnProcess(command);
    let stderrData = "";
    proc.stderr?.on("data", (chunk: Buffer) => {
      stderrData += chunk.toString();
    });

    await new Promise<void>((resolve, reject) => {
      proc.once("error", (err) => reject(new Error(`${command.binary} failed to start: ${err.message}`)));
      proc.once("close", (code) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(new Error(`${command.binary} exited with code ${code}: ${stderrData.slice(0, 200).trim()}`));
      });
      // EPIPE when the tool exits without reading its input.
      proc.stdin?.once("error", (err) => reject(new Error(`${command.binary} stopped reading: ${err.message}`)));
      proc.stdin?.end(text);
    });
  }
}

export function getClipboardCandidates(platform: NodeJS.Platform = process.platform): ClipboardCommand[] {
  switch (platform) {
    case "darwin":
      return [{ binary: "pbcopy", args: [] }];
    case "win32":
      return [{ binary: "clip", args: [] }];
    default:
      return [
        { binary: "wl-copy", args: [] },
        { binary: "xclip", args: ["-selection", "clipboard"] },
        { binary: "xsel", args: ["--clipboard", "--input"] }
      ];
  }
}

async function findClipboardCommand(): Promise<ClipboardCommand | undefined> {
  for (const candidate of getClipboardCandidates()) {
    if (await binaryExists(candidate.binary)) {
      return candidate;
    }
  }
  return undefined;
}
