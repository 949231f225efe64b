import { readFile } from "node:fs/promises";
import { createInteractiveSuspensionChannel, parseEmail } from "@mailgate/core";
import { createJsonLogger, toErrorMessage } from "@mailgate/observability";
import { AssistantApp, buildEmailRequest, createAssistantApp } from "./bootstrap";
import { loadAssistantConfig } from "./config";
import { createReadlineIO, createTerminalReviewer } from "./reviewChannel";

async function run() {
  const emailPath = process.argv[2];
  if (!emailPath) {
    console.error("Usage: mailgate-assistant <email.json>");
    process.exitCode = 2;
    return;
  }

  // Log lines go to stderr so the review prompt owns stdout.
  const logger = createJsonLogger({ component: "email-assistant", write: (line) => console.error(line) });
  const config = loadAssistantConfig();
  const email = parseEmail(JSON.parse(await readFile(emailPath, "utf8")));

  const io = createReadlineIO();
  let app: AssistantApp | undefined;
  try {
    app = await createAssistantApp({
      config,
      logger,
      channel: createInteractiveSuspensionChannel(createTerminalReviewer(io))
    });
    const result = await app.runtime.start({
      email,
      messages: [{ role: "user", content: buildEmailRequest(email) }]
    });
    console.log(JSON.stringify({ runId: result.runId, status: result.status, output: result.output ?? null }));
  } finally {
    io.close();
    await app?.close();
  }
}

run().catch((error) => {
  console.error(toErrorMessage(error));
  process.exitCode = 1;
});
