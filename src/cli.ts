/**
 * Cliniq - Command Line
 *
 *   npm run ask -- --agent clinical "Is flu common now?"
 *
 * Configuration comes from CLINIQ_* environment variables.
 */

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { configFromEnv } from "./config/router-config.ts";
import { createLogger } from "./logging/logger.ts";
import { errorMessage } from "./errors.ts";
import { createAdministrativeAgent, createClinicalAgent } from "./agents/agents.ts";

const argv = await yargs(hideBin(process.argv))
  .scriptName("cliniq")
  .usage("$0 [--agent clinical|administrative] <question..>")
  .option("agent", {
    describe: "Which agent answers the question",
    choices: ["clinical", "administrative"] as const,
    default: "clinical" as const,
  })
  .option("json", {
    describe: "Print the full route outcome as JSON",
    type: "boolean",
    default: false,
  })
  .demandCommand(1, "Ask a question")
  .strict()
  .parse();

const config = configFromEnv();
const logger = createLogger("cli", config.logging.level);
const query = argv._.map(String).join(" ");

const agent =
  argv.agent === "administrative"
    ? await createAdministrativeAgent(config, { logger })
    : await createClinicalAgent(config, { logger });

try {
  const outcome = await agent.ask(query);
  if (argv.json) {
    console.log(JSON.stringify(outcome, null, 2));
  } else if (outcome.state === "DONE") {
    console.log(outcome.text);
  } else {
    console.error(`Failed in ${outcome.failedAt}: ${outcome.error}`);
  }
  process.exitCode = outcome.state === "DONE" ? 0 : 1;
} catch (err) {
  logger.error(errorMessage(err));
  process.exitCode = 1;
} finally {
  await agent.shutdown();
}
