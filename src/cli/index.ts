#!/usr/bin/env node
import { Command } from "commander";
import { readFile } from "node:fs/promises";
import { basename, resolve } from "node:path";
import { compile } from "../compiler";
import { run_check } from "../engine";
import type { CheckOutput } from "../types";

type CliOptions = {
  strict?: boolean;
  describe?: boolean;
  json?: boolean;
};

/** 读取并解析 JSON 文件；解析失败时带上文件路径 */
async function read_json(path: string): Promise<unknown> {
  const text = await readFile(path, "utf8");
  try {
    return JSON.parse(text);
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new Error(`Invalid JSON in ${path}: ${reason}`);
  }
}

function print_report(file: string, report: CheckOutput, as_json: boolean): void {
  if (as_json) {
    console.log(JSON.stringify({ file, ...report }));
    return;
  }
  if (report.ok) {
    console.log(`✅ ${file}`);
    return;
  }
  for (const e of report.errors) {
    const where = e.path ? `${e.path}: ` : "";
    console.error(`❌ ${file}  ${where}${e.message}`);
    if (e.hint) console.error(`   ${e.hint}`);
  }
}

const program = new Command();

program
  .name("shapecheck")
  .description("Check JSON documents against a contract definition")
  .version("0.1.0")
  .argument("<definition>", "contract definition file (JSON)")
  .argument("[documents...]", "JSON documents to check")
  .option("--strict", "treat definition warnings as errors", false)
  .option("--describe", "print the compiled contract", false)
  .option("--json", "print one JSON report per document", false)
  .action(async (definition: string, documents: string[], opts: CliOptions) => {
    try {
      /***
       * 步骤: Compile
       * *****
       */
      const definition_path = resolve(definition);
      const compiled = compile({
        definition: await read_json(definition_path),
        options: { strict: opts.strict },
      });

      for (const w of compiled.warnings) {
        console.error(`⚠️  [${w.code}] ${w.path} : ${w.message}`);
      }
      if (!compiled.ok || !compiled.contract) {
        console.error(`❌ Compile failed with ${compiled.errors.length} error(s):`);
        for (const e of compiled.errors) {
          console.error(`  - [${e.code}] ${e.path} : ${e.message}`);
        }
        process.exitCode = 1;
        return;
      }
      if (opts.describe) {
        console.log(compiled.contract.describe());
      }

      /***
       * 步骤: Check
       * *****
       */
      let failed = 0;
      for (const doc of documents) {
        const report = run_check(compiled.contract, await read_json(resolve(doc)));
        if (!report.ok) failed++;
        print_report(basename(doc), report, Boolean(opts.json));
      }
      if (failed) process.exitCode = 1;
    } catch (err: unknown) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        const path = "path" in err ? String(err.path) : definition;
        console.error(`❌ Not found: ${path}`);
      } else {
        console.error(`💥 ${err instanceof Error ? err.message : String(err)}`);
      }
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`💥 Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
