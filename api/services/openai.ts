/*
 * api/services/openai.ts
 *
 * Lightweight wrapper around the OpenAI SDK for text embeddings and the
 * JSON-only chat completions used by the disambiguator.
 * Exports:
 * - getOpenAIClient(apiKey?): OpenAI
 * - getEmbeddings(inputs, model?, client?): Promise<number[][]>
 * - completeJson(prompt, model?, client?): Promise<string>
 *
 * Reads OPENAI_API_KEY when no key is passed. One client is kept per key.
 */
import OpenAI from 'openai';
import { ConfigurationError } from './errors';

const clients = new Map<string, OpenAI>();

export function getOpenAIClient(apiKey = process.env.OPENAI_API_KEY): OpenAI {
  if (!apiKey) throw new ConfigurationError('OPENAI_API_KEY is not set');
  let client = clients.get(apiKey);
  if (!client) {
    client = new OpenAI({ apiKey });
    clients.set(apiKey, client);
  }
  return client;
}

export async function getEmbeddings(
  inputs: string[],
  model = 'text-embedding-3-small',
  client: OpenAI = getOpenAIClient()
): Promise<number[][]> {
  // Return empty array for empty input to simplify callers.
  if (inputs.length === 0) return [];

  const response = await client.embeddings.create({ model, input: inputs });

  // The API answers in input order.
  return response.data.map(d => d.embedding);
}

export async function completeJson(
  prompt: string,
  model = 'gpt-4o-mini',
  client: OpenAI = getOpenAIClient()
): Promise<string> {
  const response = await client.chat.completions.create({
    model,
    messages: [{ role: 'user', content: prompt }],
    temperature: 0,
    response_format: { type: 'json_object' },
  });

  return response.choices[0]?.message.content ?? '';
}

export default { getOpenAIClient, getEmbeddings, completeJson };
