import "dotenv/config";
import { loadSettings } from "../config.js";
import { prepareBulkJob, runBulkJob } from "../services/bulkJobs.js";
import { createAppContext } from "../services/context.js";
import { readInputTableFile } from "../services/excelService.js";

// Usage: npm run enrich:bulk -- <file.csv|file.xlsx> [--images] [--batch <n>]
async function main() {
  const args = process.argv.slice(2);
  const file = args.find((arg) => !arg.startsWith("--"));
  if (!file) {
    throw new Error("Usage: runBulk <file.csv|file.xlsx> [--images] [--batch <n>]");
  }

  const batchFlag = args.indexOf("--batch");
  const batchSize = batchFlag >= 0 ? Number(args[batchFlag + 1]) : 50;

  const context = createAppContext(loadSettings());
  const { job, totalRows } = prepareBulkJob(
    readInputTableFile(file),
    { includeImages: args.includes("--images"), batchSize },
    context
  );

  console.log(`Task ${job.jobId}: enriching ${totalRows} rows`);
  const artifact = await runBulkJob(job, context);
  if (!artifact) {
    throw new Error("Bulk run finished without writing an artifact");
  }
  console.log(`Results written to ${artifact}`);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
