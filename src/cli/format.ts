import fs from "fs-extra";
import path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { bionicTokenize } from "../pipeline/bionic";
import { renderXhtml } from "../pipeline/book";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("in", { type: "string", demandOption: true, describe: "Plain text narrative" })
    .option("out", { type: "string", describe: "XHTML output (defaults to <in>.xhtml)" })
    .option("title", { type: "string" })
    .parse();

  const text = await fs.readFile(argv.in, "utf8");
  const title = argv.title || path.basename(argv.in, path.extname(argv.in));
  const outPath = argv.out || `${argv.in.replace(/\.[^./\\]+$/, "")}.xhtml`;
  const doc = bionicTokenize(text);
  await fs.writeFile(outPath, renderXhtml(title, doc), "utf8");
  console.log(`Formatted ${doc.tokens.length} words:`, path.resolve(outPath));
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
