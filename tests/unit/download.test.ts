import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { findAudioFile } from "../../src/pipeline/download.js";

let dir: string;

const touch = (...names: string[]) => {
  for (const name of names) fs.writeFileSync(path.join(dir, name), "");
};

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "tubescribe-download-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("findAudioFile", () => {
  it("ignores partial downloads and non-audio leftovers", () => {
    touch("audio.webm", "audio.webm.ytdl", "audio.mp3.part");
    expect(findAudioFile(dir, "mp3")).toBeNull();
  });

  it("returns the extracted audio file", () => {
    touch("audio.webm", "audio.mp3");
    expect(findAudioFile(dir, "wav")).toBe(path.join(dir, "audio.mp3"));
  });

  it("prefers the requested format", () => {
    touch("audio.mp3", "audio.wav");
    expect(findAudioFile(dir, "wav")).toBe(path.join(dir, "audio.wav"));
  });

  it("returns null for a missing directory", () => {
    expect(findAudioFile(path.join(dir, "nope"), "mp3")).toBeNull();
  });
});
