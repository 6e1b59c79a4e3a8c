/**
 * Extract pipeline tests: section detection, file naming, round trip.
 */

import { describe, it, expect } from "vitest";
import { existsSync, readdirSync, readFileSync, writeFileSync } from "fs";
import path from "path";
import { runCompile, runExtract } from "../src/pipeline/run.js";
import { wrapSection } from "../src/sections/markers.js";
import { ConfigError, ConversionError } from "../src/shared/errors.js";
import { makeConfig, makeWorkspace, quietLogger, StubConverter } from "./helpers.js";

function writeMerged(dir: string, body: string): string {
  const file = path.join(dir, "edited.rtf");
  writeFileSync(file, `{\\rtf1\\ansi\n${body}\n}`);
  return file;
}

describe("runExtract", () => {
  it("writes one file per section, in order", async () => {
    const ws = makeWorkspace({});
    const rtfPath = writeMerged(
      ws.root,
      [wrapSection("{\\pard STUB:Intro\\par}", "01.intro.tex"), wrapSection("{\\pard STUB:Method\\par}", "02.method.tex")].join(
        "\n",
      ),
    );
    const converter = new StubConverter();

    const result = await runExtract({ config: makeConfig(ws), rtfPath, converter, logger: quietLogger() });

    expect(result.files.map((f) => f.path)).toEqual([
      path.join(ws.outDir, "01.intro.tex"),
      path.join(ws.outDir, "02.method.tex"),
    ]);
    expect(readFileSync(path.join(ws.outDir, "01.intro.tex"), "utf-8")).toBe("Intro");
    expect(readFileSync(path.join(ws.outDir, "02.method.tex"), "utf-8")).toBe("Method");
    expect(converter.fromRtfCalls.map((c) => c.options)).toEqual([{ to: "latex" }, { to: "latex" }]);
    expect(converter.fromRtfCalls[0].rtf).toBe("{\\pard STUB:Intro\\par}");
  });

  it("skips a section whose closing marker was deleted", async () => {
    const ws = makeWorkspace({});
    const rtfPath = writeMerged(
      ws.root,
      "{\\v rtfmerge/from: 01.intro.tex}\n{\\pard STUB:Intro\\par}\n" + wrapSection("{\\pard STUB:Method\\par}", "02.method.tex"),
    );
    const logger = quietLogger();

    const result = await runExtract({ config: makeConfig(ws), rtfPath, converter: new StubConverter(), logger });

    expect(result.sections.map((s) => s.name)).toEqual(["02.method.tex"]);
    expect(readdirSync(ws.outDir)).toEqual(["02.method.tex"]);
    expect(logger.warnings).toEqual(["[SPLIT] Section marker for 01.intro.tex has no closing marker; section skipped"]);
  });

  it("extracts the whole document when there are no markers", async () => {
    const ws = makeWorkspace({});
    const rtfPath = writeMerged(ws.root, "{\\pard STUB:Everything\\par}");
    const logger = quietLogger();

    const result = await runExtract({
      config: makeConfig(ws, { extractFiletype: "markdown" }),
      rtfPath,
      converter: new StubConverter(),
      logger,
    });

    expect(result.files.map((f) => path.basename(f.path))).toEqual(["document.md"]);
    expect(readFileSync(path.join(ws.outDir, "document.md"), "utf-8")).toBe("Everything");
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0]).toMatch(/^\[SPLIT\] No rtfmerge section markers found/);
  });

  it("suffixes duplicate section names", async () => {
    const ws = makeWorkspace({});
    const rtfPath = writeMerged(
      ws.root,
      [wrapSection("{\\pard STUB:One\\par}", "a.tex"), wrapSection("{\\pard STUB:Two\\par}", "a.tex")].join("\n"),
    );

    const result = await runExtract({ config: makeConfig(ws), rtfPath, converter: new StubConverter(), logger: quietLogger() });

    expect(result.files.map((f) => path.basename(f.path))).toEqual(["a.tex", "a.2.tex"]);
    expect(readFileSync(path.join(ws.outDir, "a.2.tex"), "utf-8")).toBe("Two");
  });

  it("writes nothing when a section fails to convert", async () => {
    const ws = makeWorkspace({});
    const rtfPath = writeMerged(
      ws.root,
      [
        wrapSection("{\\pard STUB:One\\par}", "01.a.tex"),
        wrapSection("{\\pard STUB:Two\\par}", "02.b.tex"),
        wrapSection("{\\pard STUB:Three\\par}", "03.c.tex"),
      ].join("\n"),
    );
    const converter = new StubConverter();
    converter.failFromRtfAt = 2;

    await expect(runExtract({ config: makeConfig(ws), rtfPath, converter, logger: quietLogger() })).rejects.toBeInstanceOf(
      ConversionError,
    );
    expect(converter.fromRtfCalls).toHaveLength(2);
    expect(existsSync(ws.outDir)).toBe(false);
  });

  it("names files from markers an editor re-saved with cp1252 bytes", async () => {
    const ws = makeWorkspace({});
    const rtfPath = writeMerged(
      ws.root,
      "{\\rtlch\\fcs1 \\af0 \\v\\insrsid42 rtfmerge/from: 1.1.\\'e9tat.tex}\n{\\pard STUB:Etat\\par}\n" +
        "{\\rtlch\\fcs1 \\af0 \\v\\insrsid42 rtfmerge/to: 1.1.\\'e9tat.tex}",
    );

    const result = await runExtract({ config: makeConfig(ws), rtfPath, converter: new StubConverter(), logger: quietLogger() });

    expect(result.files.map((f) => f.path)).toEqual([path.join(ws.outDir, "1.1.état.tex")]);
    expect(readFileSync(path.join(ws.outDir, "1.1.état.tex"), "utf-8")).toBe("Etat");
  });

  it("reads 8-bit bytes in an edited file as cp1252 text", async () => {
    const ws = makeWorkspace({});
    const rtfPath = path.join(ws.root, "edited.rtf");
    writeFileSync(
      rtfPath,
      Buffer.concat([
        Buffer.from("{\\rtf1\\ansi\n{\\v rtfmerge/from: 01.a.tex}\n{\\pard STUB:Caf"),
        Buffer.from([0xe9]),
        Buffer.from("\\par}\n{\\v rtfmerge/to: 01.a.tex}\n}"),
      ]),
    );

    await runExtract({ config: makeConfig(ws), rtfPath, converter: new StubConverter(), logger: quietLogger() });

    expect(readFileSync(path.join(ws.outDir, "01.a.tex"), "utf-8")).toBe("Café");
  });

  it("throws ConfigError for a missing RTF file", async () => {
    const ws = makeWorkspace({});
    await expect(
      runExtract({
        config: makeConfig(ws),
        rtfPath: path.join(ws.root, "missing.rtf"),
        converter: new StubConverter(),
        logger: quietLogger(),
      }),
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it("does not need a citation style", async () => {
    const ws = makeWorkspace({});
    const rtfPath = writeMerged(ws.root, wrapSection("{\\pard STUB:x\\par}", "01.a.tex"));
    const result = await runExtract({
      config: makeConfig(ws, { citationStyle: undefined }),
      rtfPath,
      converter: new StubConverter(),
      logger: quietLogger(),
    });
    expect(result.files).toHaveLength(1);
  });
});

describe("compile then extract", () => {
  it("gets every fragment back unchanged", async () => {
    const fragments = {
      "01.intro.tex": "\\section{Introduction}\nWe study {braces}.",
      "02.method.md": "## Method\n\nSteps.",
      "03.results.tex": "Results \\cite{key}.",
    };
    const ws = makeWorkspace(fragments);
    const converter = new StubConverter();

    const compiled = await runCompile({ config: makeConfig(ws), converter, logger: quietLogger() });
    const extracted = await runExtract({
      config: makeConfig(ws, { outputDir: "extracted" }),
      rtfPath: compiled.outputPath,
      converter,
      logger: quietLogger(),
    });

    expect(extracted.sections.map((s) => s.name)).toEqual(Object.keys(fragments));
    for (const [name, content] of Object.entries(fragments)) {
      expect(readFileSync(path.join(ws.root, "extracted", name), "utf-8")).toBe(content);
    }
  });
});
