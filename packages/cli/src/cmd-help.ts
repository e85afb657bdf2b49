/**
 * argwise help - quick reference and topics
 */
import { QUICKREF, TOPICS, TOPIC_LIST } from "./help-content.js";

export { QUICKREF };

function resolveTopic(topic: string): string | null {
  const normalized = topic.toLowerCase().trim();

  // Guard against prototype-chain keys like "constructor" or "__proto__".
  if (Object.prototype.hasOwnProperty.call(TOPICS, normalized)) {
    return normalized;
  }

  // Prefix matching: "conv" -> "converters"
  const matches = TOPIC_LIST.filter((t) => t.startsWith(normalized));
  if (matches.length === 1) {
    return matches[0];
  }

  return null;
}

function renderTopicList(): string {
  return ["Available topics:", ...TOPIC_LIST.map((name) => `  - ${name}`)].join("\n");
}

export function runHelp(topic?: string): void {
  if (!topic) {
    console.log(QUICKREF);
    return;
  }

  const resolved = resolveTopic(topic);
  if (resolved) {
    console.log(TOPICS[resolved]);
    return;
  }

  console.error(`Unknown help topic: "${topic}"`);
  console.error(renderTopicList());
  console.error("Usage:\n  argwise help <topic>");
  process.exitCode = 1;
}
