import "dotenv/config";
import { toResponseBody } from "../api/enrich.js";
import { loadSettings } from "../config.js";
import { enrichmentDeps, createAppContext } from "../services/context.js";
import { enrichProduct } from "../services/enrichProduct.js";

// Usage: npm run enrich:one -- <mpn> [manufacturer] [category] [subcategory]
async function main() {
  const [mpn, manufacturer, category, subcategory] = process.argv.slice(2);
  if (!mpn) {
    throw new Error("Usage: runOne <mpn> [manufacturer] [category] [subcategory]");
  }

  const context = createAppContext(loadSettings());
  const record = await enrichProduct(
    {
      mpn,
      manufacturer,
      category,
      subcategory,
      includeImages: true,
      requestId: `cli-${Math.floor(Date.now() / 1000)}`
    },
    enrichmentDeps(context, context.usage)
  );

  console.dir(toResponseBody(record), { depth: null });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
