import { db, pool } from "@db";
import { DatabaseStorage } from "../server/storage";
import { AccountService } from "../server/services/accounts";
import { formatZodIssues, generateCodesSchema } from "../server/utils/validation";

const USAGE = "Usage: generate-manager-codes <count> [--length N]";

function parseArgs(argv: string[]) {
  let count: number | undefined;
  let length: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--length") {
      length = Number(argv[++i]);
    } else if (arg.startsWith("--length=")) {
      length = Number(arg.slice("--length=".length));
    } else if (count === undefined) {
      count = Number(arg);
    } else {
      throw new Error(`Unexpected argument '${arg}'\n${USAGE}`);
    }
  }

  const parsed = generateCodesSchema.safeParse({ count, length });
  if (!parsed.success) {
    throw new Error(`${formatZodIssues(parsed.error).join("\n")}\n${USAGE}`);
  }
  return parsed.data;
}

async function main() {
  const { count, length } = parseArgs(process.argv.slice(2));
  const accounts = new AccountService(new DatabaseStorage(db, pool));

  const codes = await accounts.generateManagerCodes(count, length);
  for (const { code } of codes) {
    console.log(code);
  }
  console.log(`[Codes] Generated ${codes.length} manager code(s)`);
}

void main()
  .catch((error) => {
    console.error("[Codes] Generation failed:", error instanceof Error ? error.message : error);
    process.exitCode = 1;
  })
  .finally(() => pool.end());
