import { z } from 'zod';
import type { RAGService } from '@/domains/rag/index.js';
import { BaseToolHandler, type ToolFactory } from '@/domains/mcp/index.js';
import { jsonResponse, type CallToolResult, type Tool } from '@/domains/mcp/core/types.js';

const echoSchema = z.object({ text: z.string().min(1) });

/**
 * Extra tool used to exercise startup registration
 */
export class EchoHandler extends BaseToolHandler<z.infer<typeof echoSchema>> {
  protected readonly schema = echoSchema;
  readonly definition: Tool;

  constructor(
    private readonly ragService: RAGService,
    name = 'echo'
  ) {
    super();
    this.definition = {
      name,
      description: 'Echoes its input together with the number of indexed documents.',
      inputSchema: { type: 'object', properties: { text: { type: 'string' } }, required: ['text'] },
    };
  }

  protected async execute(args: z.infer<typeof echoSchema>): Promise<CallToolResult> {
    return jsonResponse({ echo: args.text, documents: await this.ragService.getDocumentCount() });
  }
}

export const echoTools: ToolFactory = (ragService) => [new EchoHandler(ragService)];
