/**
 * Interactive Research Run Script
 *
 * Runs one research session in the terminal: asks for a topic, asks the
 * clarifying questions, streams progress and prints the final report.
 *
 * Usage:
 *   npm run research -- [topic] [--deliver]
 *
 * Example:
 *   npm run research -- "heat pumps in cold climates" --deliver
 *
 * Options:
 *   --deliver       E-mail the report through Resend when it is ready
 *
 * While answering questions, type "r" to get a new set of questions.
 * Ctrl-C cancels the run.
 *
 * Environment variables required:
 *   OPENAI_API_KEY
 *   BRAVE_SEARCH_API_KEY
 *   RESEND_API_KEY, RESEND_FROM_EMAIL, RESEND_TO_EMAIL (for --deliver)
 */

// Load environment variables from .env file
import * as dotenv from "dotenv";
import * as path from "path";
import { fileURLToPath } from "url";
import * as readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

dotenv.config({
  path: path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../.env"),
});

import {
  ResearchOrchestrator,
  createProvidersFromEnv,
  describeError,
  getConfig,
  type Answer,
  type ClarifyingQuestion,
  type ProgressEvent,
  type RunHandle,
} from "core";

const args = process.argv.slice(2);
const deliver = args.includes("--deliver");
const topicArg = args
  .filter((arg) => !arg.startsWith("--"))
  .join(" ")
  .trim();

const rl = readline.createInterface({ input, output });
const interrupt = new AbortController();

// Run to cancel on Ctrl-C, once one has started
let activeRun: { orchestrator: ResearchOrchestrator; handle: RunHandle } | null =
  null;

function onInterrupt(): void {
  if (!interrupt.signal.aborted) {
    interrupt.abort();
  }
  if (activeRun && !activeRun.orchestrator.currentState(activeRun.handle).completedAt) {
    activeRun.orchestrator.cancel(activeRun.handle);
  }
}
rl.on("SIGINT", onInterrupt);
process.on("SIGINT", onInterrupt);

/**
 * Print one progress event
 */
function printEvent(event: ProgressEvent): void {
  switch (event.type) {
    case "stage_started":
      console.log(`⏳ ${event.message}...`);
      break;
    case "stage_completed":
      console.log(`✓ ${event.message}`);
      break;
    case "search_settled":
      console.log(
        `  ${event.outcome.succeeded ? "✓" : "✗"} [${event.settled}/${event.total}] ${event.outcome.item.term}`
      );
      break;
    case "warning":
      console.log(`⚠️ ${event.message}`);
      break;
    case "report_ready":
      console.log("\n" + "=".repeat(60));
      console.log("  REPORT");
      console.log("=".repeat(60) + "\n");
      console.log(event.report.markdown);
      if (event.report.followUpQuestions.length > 0) {
        console.log("\nFollow-up questions:");
        event.report.followUpQuestions.forEach((q) => console.log(`  - ${q}`));
      }
      console.log();
      break;
    case "failed":
      console.log(`❌ ${event.message}`);
      break;
    case "cancelled":
      console.log(`\n🛑 ${event.message}`);
      break;
    case "done":
      console.log(`\n✅ ${event.message}`);
      break;
    case "need_answers":
      break;
  }
}

/**
 * Ask every question; "r" asks for a new set instead
 */
async function askQuestions(
  questions: readonly ClarifyingQuestion[]
): Promise<Answer[] | "regenerate"> {
  console.log("\nPlease answer the following questions (type 'r' for new questions):\n");

  const answers: Answer[] = [];
  for (const question of questions) {
    const text = (
      await rl.question(`${question.text}\n> `, { signal: interrupt.signal })
    ).trim();
    if (text.toLowerCase() === "r") {
      return "regenerate";
    }
    answers.push({ questionId: question.id, text });
  }
  console.log();
  return answers;
}

async function handleQuestions(
  orchestrator: ResearchOrchestrator,
  handle: RunHandle,
  questions: readonly ClarifyingQuestion[]
): Promise<void> {
  const reply = await askQuestions(questions);

  if (reply === "regenerate") {
    try {
      // The new questions arrive as another need_answers event
      await orchestrator.regenerateQuestions(handle);
    } catch (error) {
      console.log(`⚠️ Could not regenerate questions: ${describeError(error)}`);
      await handleQuestions(orchestrator, handle, questions);
    }
    return;
  }

  orchestrator.supplyAnswers(handle, reply);
}

async function main(): Promise<void> {
  console.log("\n" + "=".repeat(60));
  console.log("  RESEARCH RUN");
  console.log("=".repeat(60) + "\n");

  const config = getConfig();
  const providers = createProvidersFromEnv(config);
  const orchestrator = new ResearchOrchestrator({ ...providers, config });

  const topic =
    topicArg ||
    (await rl.question("What would you like to research?\n> ", {
      signal: interrupt.signal,
    }));

  const handle = orchestrator.start(topic, { deliver });
  activeRun = { orchestrator, handle };
  console.log(`\nRun ID:   ${handle.runId}`);
  console.log(`Trace ID: ${handle.traceId}`);
  console.log(`Deliver:  ${deliver ? "Yes" : "No"}\n`);

  for await (const event of handle.events) {
    printEvent(event);

    if (event.type === "need_answers") {
      try {
        await handleQuestions(orchestrator, handle, event.questions);
      } catch (error) {
        // Ctrl-C while a question was open; the cancelled event follows
        if (!interrupt.signal.aborted) {
          throw error;
        }
      }
    }
  }

  const final = await handle.completion;
  const duration = ((final.completedAt ?? Date.now()) - final.startedAt) / 1000;
  console.log(`Status:   ${final.status}`);
  console.log(`Searches: ${final.searchResults.filter((o) => o.succeeded).length}/${final.searchResults.length} succeeded`);
  console.log(`Duration: ${duration.toFixed(1)}s`);
  if (final.failure) {
    console.log(`Failure:  [${final.failure.stage}] ${final.failure.message}`);
  }

  process.exitCode = final.status === "done" ? 0 : 1;
}

void main()
  .catch((error: unknown) => {
    console.error(`\n❌ ${describeError(error)}`);
    process.exitCode = 1;
  })
  .finally(() => {
    rl.close();
  });
