import path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { YtDlpAcquirer } from "../pipeline/acquire";
import { SegmentedTranscriber } from "../pipeline/audio";
import { readVideoList, runBatch } from "../pipeline/batch";
import { XhtmlBookWriter } from "../pipeline/book";
import { ENV } from "../pipeline/env";
import { ConcurrencyGate } from "../pipeline/gate";
import { GroqClient } from "../pipeline/groq";
import { setLogFile, setLogLevel } from "../pipeline/log";
import { recordOutcome } from "../pipeline/run_db";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("video", { type: "string", array: true, describe: "Video ID or URL (repeatable)" })
    .option("links", { type: "string", default: "links.txt", describe: "File with one video ID or URL per line" })
    .option("out", { type: "string", default: ENV.outputDir })
    .option("concurrency", { type: "number", default: 1, describe: "Videos converted in parallel" })
    .option("char-budget", { type: "number", default: ENV.charBudget })
    .option("overlap", { type: "number", default: ENV.overlapSegments })
    .option("transcribe", { type: "boolean", default: true, describe: "Use speech-to-text alongside captions" })
    .option("keep-audio", { type: "boolean", default: ENV.keepAudio })
    .option("verbose", { type: "boolean", default: false, describe: "Log debug events" })
    .parse();

  if (argv.verbose) setLogLevel("debug");

  const videos = argv.video?.length ? argv.video.map(String) : await readVideoList(argv.links);
  if (!videos.length) {
    console.error("No videos to convert.");
    process.exit(1);
  }
  setLogFile(path.resolve(ENV.artifactsRoot, `batch-${Date.now()}.log`));
  console.log(`Loaded ${videos.length} videos. Starting conversion...`);

  const client = GroqClient.fromEnv();
  const summary = await runBatch(
    videos,
    {
      acquirer: new YtDlpAcquirer(),
      transcriber: argv.transcribe
        ? new SegmentedTranscriber(client, {
            maxBytes: ENV.transcribeMaxMb * 1024 * 1024,
            segmentSec: ENV.audioSegmentSec,
          })
        : undefined,
      rewriter: client,
      assembler: new XhtmlBookWriter(path.resolve(argv.out)),
      gate: new ConcurrencyGate(ENV.rewriteConcurrency, "rewrite.gate"),
    },
    {
      concurrency: argv.concurrency,
      pipeline: {
        chunk: { charBudget: argv["char-budget"], overlapSegments: argv.overlap },
        keepAudio: argv["keep-audio"],
      },
      onOutcome: async (o) => {
        const label = o.status === "failed" ? "FAILED  " : o.status === "degraded" ? "DEGRADED" : "OK      ";
        console.log(`${label} ${o.videoId}${o.outputPath ? ` -> ${o.outputPath}` : ""}${o.reason ? ` (${o.reason})` : ""}`);
        await recordOutcome(o);
      },
    }
  );

  console.log(`\n=== Batch Summary ===`);
  console.log(`Total:     ${videos.length}`);
  console.log(`Succeeded: ${summary.succeeded}`);
  console.log(`Degraded:  ${summary.degraded}`);
  console.log(`Failed:    ${summary.failed}`);
  if (summary.failed === videos.length) process.exit(1);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
