import fetch from 'node-fetch';
import { z } from 'zod';
import { GenerationError } from '../lib/errors.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export type ChatMessage = { role: ChatRole; content: string };

export type ChatRequest = {
  model: string;
  messages: ChatMessage[];
  options?: { temperature?: number; top_p?: number; top_k?: number };
};

export type ChatChunk = { content: string; done: boolean };

/** What the orchestrator needs from a text-generation server. */
export interface ChatBackend {
  reachable(): Promise<boolean>;
  /** Streams the reply; aborting the signal ends the request. */
  chat(request: ChatRequest, signal: AbortSignal): AsyncIterable<ChatChunk>;
}

const chunkSchema = z.object({
  message: z.object({ content: z.string().optional() }).optional(),
  done: z.boolean().optional(),
  error: z.string().optional()
});

function parseLine(line: string): ChatChunk {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (e) {
    throw new GenerationError('BackendFailed', `Unreadable chunk from backend: ${line.slice(0, 80)}`, { cause: e });
  }
  const parsed = chunkSchema.safeParse(json);
  if (!parsed.success) {
    throw new GenerationError('BackendFailed', `Unexpected chunk from backend: ${line.slice(0, 80)}`);
  }
  if (parsed.data.error) throw new GenerationError('BackendFailed', `Backend error: ${parsed.data.error}`);
  return { content: parsed.data.message?.content ?? '', done: parsed.data.done ?? false };
}

/**
 * Client for an Ollama-compatible server: `/api/version` for liveness and
 * `/api/chat` streaming newline-delimited JSON.
 */
export class OllamaClient implements ChatBackend {
  private readonly probeTimeoutMs: number;

  constructor(
    private readonly baseUrl: string,
    opts: { probeTimeoutMs?: number } = {}
  ) {
    this.probeTimeoutMs = opts.probeTimeoutMs ?? 2000;
  }

  async reachable(): Promise<boolean> {
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.probeTimeoutMs);
    try {
      const r = await fetch(`${this.baseUrl}/api/version`, { method: 'GET', signal: controller.signal });
      return r.ok;
    } catch {
      // refused, DNS failure or probe timeout all mean "not reachable"
      return false;
    } finally {
      clearTimeout(t);
    }
  }

  async *chat(request: ChatRequest, signal: AbortSignal): AsyncIterable<ChatChunk> {
    const r = await fetch(`${this.baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ ...request, stream: true }),
      signal
    });
    if (!r.ok) {
      const body = await r.text().catch(() => '');
      throw new GenerationError('BackendFailed', `Ollama chat failed (${r.status}): ${body.slice(0, 200)}`);
    }
    if (!r.body) throw new GenerationError('BackendFailed', 'Ollama chat returned no body');

    const decoder = new TextDecoder();
    let buffered = '';
    for await (const part of r.body) {
      buffered += typeof part === 'string' ? part : decoder.decode(part, { stream: true });
      let nl = buffered.indexOf('\n');
      while (nl >= 0) {
        const line = buffered.slice(0, nl).trim();
        buffered = buffered.slice(nl + 1);
        if (line) {
          const chunk = parseLine(line);
          yield chunk;
          if (chunk.done) return;
        }
        nl = buffered.indexOf('\n');
      }
    }
    buffered += decoder.decode();
    if (buffered.trim()) yield parseLine(buffered.trim());
  }
}
