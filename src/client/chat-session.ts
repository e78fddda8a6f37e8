import type OpenAI from "openai";
import { createLogger } from "../utils/logger.js";
import { isRecordObject } from "../utils/type-guards.js";

const logger = createLogger("chat-session");

type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam;
type ToolCall = OpenAI.Chat.ChatCompletionMessageToolCall;

/** The slice of the OpenAI client the session needs. */
export interface ChatCompletionsApi {
  create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.Chat.ChatCompletion>;
}

/** The slice of the MCP client the session needs. */
export interface ToolCaller {
  callTool(params: { name: string; arguments?: Record<string, unknown> }): Promise<unknown>;
}

export interface ChatSessionOptions {
  completions: ChatCompletionsApi;
  toolCaller: ToolCaller;
  tools: OpenAI.Chat.ChatCompletionTool[];
  model: string;
  maxToolRounds: number;
  print?: (line: string) => void;
}

/**
 * Returns the first text block of an MCP tool result, or "Success" when the
 * result carries no content.
 */
export function extractToolOutput(result: unknown): string {
  if (!isRecordObject(result) || !Array.isArray(result.content) || result.content.length === 0) {
    return "Success";
  }
  for (const block of result.content) {
    if (isRecordObject(block) && block.type === "text" && typeof block.text === "string") {
      return block.text;
    }
  }
  return JSON.stringify(result.content);
}

function parseArguments(raw: string): Record<string, unknown> {
  const parsed: unknown = raw.trim() === "" ? {} : JSON.parse(raw);
  if (!isRecordObject(parsed) || Array.isArray(parsed)) {
    throw new Error("Tool arguments must be a JSON object");
  }
  return parsed;
}

/**
 * One conversation with the model. Tool calls the model requests are run on
 * the MCP server and their output is fed back until the model answers in
 * plain text or the round limit is hit.
 */
export class ChatSession {
  private readonly options: ChatSessionOptions;
  private readonly messages: ChatMessage[] = [];
  private readonly print: (line: string) => void;

  constructor(options: ChatSessionOptions) {
    this.options = options;
    this.print = options.print ?? ((line) => console.log(line));
  }

  get history(): readonly ChatMessage[] {
    return this.messages;
  }

  async send(userInput: string): Promise<string> {
    const { completions, model, tools, maxToolRounds } = this.options;
    this.messages.push({ role: "user", content: userInput });

    for (let round = 0; round < maxToolRounds; round++) {
      const response = await completions.create({
        model,
        messages: this.messages,
        ...(tools.length > 0 ? { tools, tool_choice: "auto" as const } : {}),
      });
      const message = response.choices[0]?.message;
      if (!message) {
        throw new Error("Model returned no choices");
      }

      const toolCalls = message.tool_calls ?? [];
      if (toolCalls.length === 0) {
        return this.appendAssistant(message.content ?? "");
      }

      this.messages.push({ role: "assistant", content: message.content, tool_calls: toolCalls });
      for (const call of toolCalls) {
        const output = await this.executeToolCall(call);
        this.messages.push({ role: "tool", tool_call_id: call.id, content: output });
      }
    }

    logger.debug({ maxToolRounds }, "Tool round limit reached, requesting final answer");
    const final = await completions.create({ model, messages: this.messages });
    return this.appendAssistant(final.choices[0]?.message.content ?? "");
  }

  private appendAssistant(text: string): string {
    this.messages.push({ role: "assistant", content: text });
    return text;
  }

  private async executeToolCall(call: ToolCall): Promise<string> {
    const name = call.function.name;
    this.print(` > Executing tool: ${name}...`);

    let output: string;
    try {
      const args = parseArguments(call.function.arguments);
      const result = await this.options.toolCaller.callTool({ name, arguments: args });
      output = extractToolOutput(result);
    } catch (error) {
      output = `Error: ${error instanceof Error ? error.message : String(error)}`;
    }

    this.print(` > Result: ${output}`);
    return output;
  }
}
