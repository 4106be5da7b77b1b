import { registerAs } from "@nestjs/config";

export default registerAs("agent", () => ({
  recursionLimit: Number.parseInt(
    process.env.AGENT_RECURSION_LIMIT ?? "15",
    10,
  ),
  systemPromptPath:
    process.env.AGENT_SYSTEM_PROMPT_PATH ?? "prompts/analyst.prompt.txt",
}));
