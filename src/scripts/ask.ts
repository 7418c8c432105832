import "dotenv/config";

import { parseArgs } from "node:util";

import { loadRagConfig } from "@/lib/config";
import { errorMessage } from "@/lib/result";
import { createRagService } from "@/lib/rag-service";

const USAGE = 'Usage: npm run ask -- [--grade 8] [--user cli-user] [--kb name] "your question"';

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      grade: { type: "string" },
      user: { type: "string" },
      kb: { type: "string" },
    },
  });

  const question = positionals.join(" ").trim();
  if (!question) {
    console.error(USAGE);
    return 1;
  }

  const service = await createRagService(loadRagConfig());

  if (values.kb) {
    const matches = await service.knowledgeStore.searchKnowledgeBase(question, values.kb);
    console.log(JSON.stringify(matches, null, 2));
    return 0;
  }

  const answer = await service.orchestrator.processEducationalQuery(
    question,
    values.user ?? "cli-user",
    Number(values.grade ?? "8"),
  );
  console.log(answer);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[ask] startup failed", { message: errorMessage(error) });
    process.exitCode = 1;
  });
