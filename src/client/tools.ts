import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type OpenAI from "openai";

/** Adapts MCP tool definitions to OpenAI function-calling tools. */
export function convertMcpToOpenAiTools(mcpTools: Tool[]): OpenAI.Chat.ChatCompletionTool[] {
  return mcpTools.map((tool): OpenAI.Chat.ChatCompletionTool => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: { ...tool.inputSchema },
    },
  }));
}
