/**
 * API Client Tests
 *
 * Runs the client against a stubbed fetch; nothing leaves the process.
 *
 * @module core/__tests__/api-client.test
 */

import { describe, it, expect, vi } from 'vitest';
import { TavusClient } from '../api-client.js';

function stubFetch(status: number, body: string) {
  return vi.fn(async (_input: string, _init?: RequestInit): Promise<Response> => new Response(body, { status }));
}

const replicaPayload = {
  replica_id: 'r1',
  replica_name: 'Twin',
  replica_type: 'user',
  status: 'completed',
  training_progress: '100/100',
  created_at: '2024-01-01T00:00:00Z',
};

describe('TavusClient', () => {
  describe('queries', () => {
    it('lists replicas with the key header', async () => {
      const fetch = stubFetch(200, JSON.stringify({ data: [replicaPayload] }));
      const client = new TavusClient('test-secret', { fetch });

      const result = await client.listReplicas();

      expect(result.ok).toBe(true);
      expect(result.message).toBe('Successfully fetched 1 replica(s)');
      expect(result.data?.[0]?.name).toBe('Twin');
      expect(result.data?.[0]?.updatedAt).toBe('');
      expect(fetch).toHaveBeenCalledWith('https://tavusapi.com/v2/replicas?verbose=true', {
        method: 'GET',
        headers: { 'x-api-key': 'test-secret' },
      });
    });

    it('treats a missing list as empty', async () => {
      const client = new TavusClient('test-secret', { fetch: stubFetch(200, JSON.stringify({ data: null })) });

      const result = await client.listVideos();

      expect(result).toEqual({ ok: true, message: 'Successfully fetched 0 video(s)', data: [] });
    });

    it('reports HTTP errors with the response body', async () => {
      const client = new TavusClient('test-secret', { fetch: stubFetch(401, 'Invalid API key') });

      const result = await client.listReplicas();

      expect(result).toEqual({ ok: false, message: 'Error: HTTP 401 - Invalid API key', data: null });
    });

    it('rejects payloads that do not match the schema', async () => {
      const client = new TavusClient('test-secret', {
        fetch: stubFetch(200, JSON.stringify({ data: [{ replica_name: 'No id' }] })),
      });

      const result = await client.listReplicas();

      expect(result).toEqual({
        ok: false,
        message: 'Unexpected response from GET /replicas?verbose=true',
        data: null,
      });
    });

    it('rejects bodies that are not JSON', async () => {
      const client = new TavusClient('test-secret', { fetch: stubFetch(200, '<html>') });

      const result = await client.getVideo('v1');

      expect(result.message).toBe('Unexpected response from GET /videos/v1');
    });

    it('turns transport failures into results', async () => {
      const client = new TavusClient('test-secret', {
        fetch: async () => {
          throw new Error('socket hang up');
        },
      });

      const result = await client.listConversations();

      expect(result).toEqual({ ok: false, message: 'Error fetching conversations: socket hang up', data: null });
    });

    it('fetches personas by type', async () => {
      const fetch = stubFetch(200, JSON.stringify({ data: [] }));
      const client = new TavusClient('test-secret', { fetch, baseUrl: 'http://localhost:4010/v2/' });

      await client.listPersonas('system');

      expect(fetch.mock.calls[0]?.[0]).toBe('http://localhost:4010/v2/personas?persona_type=system');
    });
  });

  describe('request bodies', () => {
    it('sends only the persona fields that were given', async () => {
      const fetch = stubFetch(
        200,
        JSON.stringify({ persona_id: 'p1', persona_name: 'Coach', system_prompt: 'You coach runners.' })
      );
      const client = new TavusClient('test-secret', { fetch });

      const result = await client.createPersona({ personaName: 'Coach', systemPrompt: 'You coach runners.' });

      expect(result.ok).toBe(true);
      expect(result.data?.defaultReplicaId).toBe('');
      expect(fetch).toHaveBeenCalledWith('https://tavusapi.com/v2/personas', {
        method: 'POST',
        headers: { 'x-api-key': 'test-secret', 'Content-Type': 'application/json' },
        body: JSON.stringify({ persona_name: 'Coach', system_prompt: 'You coach runners.' }),
      });
    });

    it('renames personas with a JSON patch', async () => {
      const fetch = stubFetch(200, '');
      const client = new TavusClient('test-secret', { fetch });

      const status = await client.renamePersona('p1', 'Mentor');

      expect(status).toEqual({ ok: true, message: 'Successfully renamed persona' });
      expect(fetch.mock.calls[0]?.[1]?.method).toBe('PATCH');
      expect(fetch.mock.calls[0]?.[1]?.body).toBe(
        JSON.stringify([{ op: 'replace', path: '/persona_name', value: 'Mentor' }])
      );
    });

    it('renames videos through the name endpoint', async () => {
      const fetch = stubFetch(200, '');
      const client = new TavusClient('test-secret', { fetch });

      await client.renameVideo('v1', 'Intro');

      expect(fetch.mock.calls[0]?.[0]).toBe('https://tavusapi.com/v2/videos/v1/name');
      expect(fetch.mock.calls[0]?.[1]?.body).toBe(JSON.stringify({ video_name: 'Intro' }));
    });

    it('creates conversations with the optional fields given', async () => {
      const fetch = stubFetch(
        200,
        JSON.stringify({ conversation_id: 'c1', conversation_url: 'https://example.test/c1', status: 'active' })
      );
      const client = new TavusClient('test-secret', { fetch });

      const result = await client.createConversation({ replicaId: 'r1', conversationName: 'Standup' });

      expect(result.data?.url).toBe('https://example.test/c1');
      expect(fetch.mock.calls[0]?.[1]?.body).toBe(JSON.stringify({ replica_id: 'r1', conversation_name: 'Standup' }));
    });
  });

  describe('commands', () => {
    it('encodes ids in paths', async () => {
      const fetch = stubFetch(200, '');
      const client = new TavusClient('test-secret', { fetch });

      await client.endConversation('c/1');

      expect(fetch.mock.calls[0]?.[0]).toBe('https://tavusapi.com/v2/conversations/c%2F1/end');
      expect(fetch.mock.calls[0]?.[1]?.method).toBe('POST');
    });

    it('reports command failures', async () => {
      const client = new TavusClient('test-secret', { fetch: stubFetch(404, 'not found') });

      const status = await client.deleteReplica('r404');

      expect(status).toEqual({ ok: false, message: 'Error: HTTP 404 - not found' });
    });

    it('reports command transport failures', async () => {
      const client = new TavusClient('test-secret', {
        fetch: async () => {
          throw new Error('ECONNRESET');
        },
      });

      const status = await client.deleteVideo('v1');

      expect(status).toEqual({ ok: false, message: 'Error deleting video: ECONNRESET' });
    });
  });
});
