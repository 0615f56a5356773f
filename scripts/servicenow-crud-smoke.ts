// Manual smoke test against a real ServiceNow instance: reads a few records
// from the first allow-listed table through the CRUD client.
import * as dotenv from "dotenv";
import { loadServiceNowSettings } from "../lib/config";
import { withCrudClient } from "../lib/infrastructure/servicenow";

dotenv.config({ path: ".env.local" });

async function main(): Promise<void> {
  const settings = await loadServiceNowSettings();
  const table = process.argv[2] ?? settings.allowedTables[0];

  console.log("\n=== ServiceNow CRUD Smoke Test ===");
  console.log("Instance URL:", settings.instanceUrl);
  console.log("Table:", table);
  console.log("==================================\n");

  const response = await withCrudClient({ settings }, (client) =>
    client.read(table, { limit: 5, fields: ["sys_id", "number", "short_description"] }),
  );

  if (!response.success) {
    console.error(`Read failed (${response.errorType}): ${response.error}`);
    process.exitCode = 1;
    return;
  }

  console.log(`Retrieved ${response.count} record(s)`);
  for (const record of response.data ?? []) {
    console.log(`  ${String(record.number ?? record.sys_id)}: ${String(record.short_description ?? "")}`);
  }
}

main().catch((error: unknown) => {
  console.error("Smoke test failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
