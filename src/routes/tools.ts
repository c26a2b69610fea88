// Tool routes
import type { FastifyInstance } from 'fastify';
import type { ToolRegistry } from '../services/tools/registry.js';

export interface ToolRouteOptions {
  registry: ToolRegistry;
}

export async function toolRoutes(server: FastifyInstance, opts: ToolRouteOptions) {
  // GET /v1/tools - Registered tools, in the order the model sees them
  server.get('/tools', async () => {
    const tools = opts.registry.list().map(tool => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    }));
    return { tools };
  });
}
