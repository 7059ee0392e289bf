/**
 * Tavus API Client
 *
 * Thin wrapper around the REST API. Every method resolves to a result
 * object and never rejects: HTTP errors, transport failures and payloads
 * that do not match the schemas all come back as `ok: false` with a
 * printable message.
 *
 * @module api-client
 */

import { z } from 'zod';
import { describeError } from './errors.js';
import {
  Conversation,
  ConversationPayloadSchema,
  Persona,
  PersonaPayloadSchema,
  Replica,
  ReplicaPayloadSchema,
  Video,
  VideoPayloadSchema,
  type PersonaType,
} from './models.js';

export const DEFAULT_API_URL = 'https://tavusapi.com/v2';

// ============================================================================
// Result Types
// ============================================================================

export interface ApiSuccess<T> {
  ok: true;
  message: string;
  data: T;
}

export interface ApiFailure {
  ok: false;
  message: string;
  data: null;
}

/**
 * Outcome of a call that returns a payload
 */
export type ApiResult<T> = ApiSuccess<T> | ApiFailure;

/**
 * Outcome of a call that returns no payload (delete, rename, end)
 */
export interface ApiStatus {
  ok: boolean;
  message: string;
}

// ============================================================================
// Request Inputs
// ============================================================================

export interface CreateReplicaInput {
  replicaName: string;
  trainVideoUrl: string;
  consentVideoUrl: string;
}

export interface CreatePersonaInput {
  personaName: string;
  systemPrompt: string;
  context?: string;
  defaultReplicaId?: string;
}

export interface GenerateVideoInput {
  videoName: string;
  replicaId: string;
  script: string;
}

export interface CreateConversationInput {
  replicaId?: string;
  personaId?: string;
  conversationName?: string;
  conversationalContext?: string;
}

// ============================================================================
// Client Contract
// ============================================================================

/**
 * Operations the resource modules need from the remote API
 */
export interface TavusApi {
  listReplicas(): Promise<ApiResult<Replica[]>>;
  getReplica(replicaId: string): Promise<ApiResult<Replica>>;
  createReplica(input: CreateReplicaInput): Promise<ApiResult<Replica>>;
  renameReplica(replicaId: string, name: string): Promise<ApiStatus>;
  deleteReplica(replicaId: string): Promise<ApiStatus>;

  listPersonas(personaType: PersonaType): Promise<ApiResult<Persona[]>>;
  getPersona(personaId: string): Promise<ApiResult<Persona>>;
  createPersona(input: CreatePersonaInput): Promise<ApiResult<Persona>>;
  renamePersona(personaId: string, name: string): Promise<ApiStatus>;
  deletePersona(personaId: string): Promise<ApiStatus>;

  listVideos(): Promise<ApiResult<Video[]>>;
  getVideo(videoId: string): Promise<ApiResult<Video>>;
  generateVideo(input: GenerateVideoInput): Promise<ApiResult<Video>>;
  renameVideo(videoId: string, name: string): Promise<ApiStatus>;
  deleteVideo(videoId: string): Promise<ApiStatus>;

  listConversations(): Promise<ApiResult<Conversation[]>>;
  getConversation(conversationId: string): Promise<ApiResult<Conversation>>;
  createConversation(input: CreateConversationInput): Promise<ApiResult<Conversation>>;
  endConversation(conversationId: string): Promise<ApiStatus>;
  deleteConversation(conversationId: string): Promise<ApiStatus>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface TavusClientOptions {
  /** Base URL without trailing slash */
  baseUrl?: string;
  /** fetch implementation (defaults to the global one) */
  fetch?: FetchLike;
}

type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

type Decoder<T> = (body: unknown) => T | null;

function decodeWith<S extends z.ZodTypeAny, T>(
  schema: S,
  build: (value: z.output<S>) => T
): Decoder<T> {
  return (body) => {
    const parsed = schema.safeParse(body);
    return parsed.success ? build(parsed.data) : null;
  };
}

function listOf<S extends z.ZodTypeAny>(schema: S) {
  return z.object({ data: z.array(schema).nullish().transform((items) => items ?? []) });
}

const decodeReplica = decodeWith(ReplicaPayloadSchema, Replica.fromPayload);
const decodeReplicas = decodeWith(listOf(ReplicaPayloadSchema), (body) =>
  body.data.map((item) => Replica.fromPayload(item))
);
const decodePersona = decodeWith(PersonaPayloadSchema, Persona.fromPayload);
const decodePersonas = decodeWith(listOf(PersonaPayloadSchema), (body) =>
  body.data.map((item) => Persona.fromPayload(item))
);
const decodeVideo = decodeWith(VideoPayloadSchema, Video.fromPayload);
const decodeVideos = decodeWith(listOf(VideoPayloadSchema), (body) =>
  body.data.map((item) => Video.fromPayload(item))
);
const decodeConversation = decodeWith(ConversationPayloadSchema, Conversation.fromPayload);
const decodeConversations = decodeWith(listOf(ConversationPayloadSchema), (body) =>
  body.data.map((item) => Conversation.fromPayload(item))
);

function plural(count: number, noun: string): string {
  return `${count} ${noun}(s)`;
}

/**
 * Drop undefined fields so they are not sent as explicit nulls
 */
function compact(body: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(body)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

// ============================================================================
// Client
// ============================================================================

export class TavusClient implements TavusApi {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly apiKey: string,
    options: TavusClientOptions = {}
  ) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  // --------------------------------------------------------------------------
  // Replicas
  // --------------------------------------------------------------------------

  listReplicas(): Promise<ApiResult<Replica[]>> {
    return this.query('fetching replicas', 'GET', '/replicas?verbose=true', decodeReplicas, (items) =>
      `Successfully fetched ${plural(items.length, 'replica')}`
    );
  }

  getReplica(replicaId: string): Promise<ApiResult<Replica>> {
    return this.query(
      'fetching replica',
      'GET',
      `/replicas/${encodeURIComponent(replicaId)}?verbose=true`,
      decodeReplica,
      () => 'Successfully fetched replica'
    );
  }

  createReplica(input: CreateReplicaInput): Promise<ApiResult<Replica>> {
    return this.query(
      'creating replica',
      'POST',
      '/replicas',
      decodeReplica,
      () => 'Successfully created replica',
      {
        replica_name: input.replicaName,
        train_video_url: input.trainVideoUrl,
        consent_video_url: input.consentVideoUrl,
      }
    );
  }

  renameReplica(replicaId: string, name: string): Promise<ApiStatus> {
    return this.command(
      'renaming replica',
      'PATCH',
      `/replicas/${encodeURIComponent(replicaId)}`,
      'Successfully renamed replica',
      { replica_name: name }
    );
  }

  deleteReplica(replicaId: string): Promise<ApiStatus> {
    return this.command(
      'deleting replica',
      'DELETE',
      `/replicas/${encodeURIComponent(replicaId)}`,
      'Successfully deleted replica'
    );
  }

  // --------------------------------------------------------------------------
  // Personas
  // --------------------------------------------------------------------------

  listPersonas(personaType: PersonaType): Promise<ApiResult<Persona[]>> {
    return this.query(
      'fetching personas',
      'GET',
      `/personas?persona_type=${personaType}`,
      decodePersonas,
      (items) => `Successfully fetched ${plural(items.length, 'persona')}`
    );
  }

  getPersona(personaId: string): Promise<ApiResult<Persona>> {
    return this.query(
      'fetching persona',
      'GET',
      `/personas/${encodeURIComponent(personaId)}`,
      decodePersona,
      () => 'Successfully fetched persona'
    );
  }

  createPersona(input: CreatePersonaInput): Promise<ApiResult<Persona>> {
    return this.query(
      'creating persona',
      'POST',
      '/personas',
      decodePersona,
      () => 'Successfully created persona',
      compact({
        persona_name: input.personaName,
        system_prompt: input.systemPrompt,
        context: input.context,
        default_replica_id: input.defaultReplicaId,
      })
    );
  }

  renamePersona(personaId: string, name: string): Promise<ApiStatus> {
    return this.command(
      'renaming persona',
      'PATCH',
      `/personas/${encodeURIComponent(personaId)}`,
      'Successfully renamed persona',
      [{ op: 'replace', path: '/persona_name', value: name }]
    );
  }

  deletePersona(personaId: string): Promise<ApiStatus> {
    return this.command(
      'deleting persona',
      'DELETE',
      `/personas/${encodeURIComponent(personaId)}`,
      'Successfully deleted persona'
    );
  }

  // --------------------------------------------------------------------------
  // Videos
  // --------------------------------------------------------------------------

  listVideos(): Promise<ApiResult<Video[]>> {
    return this.query('fetching videos', 'GET', '/videos', decodeVideos, (items) =>
      `Successfully fetched ${plural(items.length, 'video')}`
    );
  }

  getVideo(videoId: string): Promise<ApiResult<Video>> {
    return this.query(
      'fetching video',
      'GET',
      `/videos/${encodeURIComponent(videoId)}`,
      decodeVideo,
      () => 'Successfully fetched video'
    );
  }

  generateVideo(input: GenerateVideoInput): Promise<ApiResult<Video>> {
    return this.query(
      'generating video',
      'POST',
      '/videos',
      decodeVideo,
      () => 'Successfully started video generation',
      {
        video_name: input.videoName,
        replica_id: input.replicaId,
        script: input.script,
      }
    );
  }

  renameVideo(videoId: string, name: string): Promise<ApiStatus> {
    return this.command(
      'renaming video',
      'PATCH',
      `/videos/${encodeURIComponent(videoId)}/name`,
      'Successfully renamed video',
      { video_name: name }
    );
  }

  deleteVideo(videoId: string): Promise<ApiStatus> {
    return this.command(
      'deleting video',
      'DELETE',
      `/videos/${encodeURIComponent(videoId)}`,
      'Successfully deleted video'
    );
  }

  // --------------------------------------------------------------------------
  // Conversations
  // --------------------------------------------------------------------------

  listConversations(): Promise<ApiResult<Conversation[]>> {
    return this.query('fetching conversations', 'GET', '/conversations', decodeConversations, (items) =>
      `Successfully fetched ${plural(items.length, 'conversation')}`
    );
  }

  getConversation(conversationId: string): Promise<ApiResult<Conversation>> {
    return this.query(
      'fetching conversation',
      'GET',
      `/conversations/${encodeURIComponent(conversationId)}`,
      decodeConversation,
      () => 'Successfully fetched conversation'
    );
  }

  createConversation(input: CreateConversationInput): Promise<ApiResult<Conversation>> {
    return this.query(
      'creating conversation',
      'POST',
      '/conversations',
      decodeConversation,
      () => 'Successfully created conversation',
      compact({
        replica_id: input.replicaId,
        persona_id: input.personaId,
        conversation_name: input.conversationName,
        conversational_context: input.conversationalContext,
      })
    );
  }

  endConversation(conversationId: string): Promise<ApiStatus> {
    return this.command(
      'ending conversation',
      'POST',
      `/conversations/${encodeURIComponent(conversationId)}/end`,
      'Successfully ended conversation'
    );
  }

  deleteConversation(conversationId: string): Promise<ApiStatus> {
    return this.command(
      'deleting conversation',
      'DELETE',
      `/conversations/${encodeURIComponent(conversationId)}`,
      'Successfully deleted conversation'
    );
  }

  // --------------------------------------------------------------------------
  // Transport
  // --------------------------------------------------------------------------

  /**
   * Call an endpoint that returns a payload
   */
  private async query<T>(
    activity: string,
    method: HttpMethod,
    path: string,
    decode: Decoder<T>,
    successMessage: (data: T) => string,
    body?: unknown
  ): Promise<ApiResult<T>> {
    try {
      const response = await this.send(method, path, body);
      const raw = await response.text();

      if (!response.ok) {
        return { ok: false, message: `Error: HTTP ${response.status} - ${raw}`, data: null };
      }

      let parsed: unknown;
      try {
        parsed = raw.length > 0 ? JSON.parse(raw) : null;
      } catch {
        return { ok: false, message: `Unexpected response from ${method} ${path}`, data: null };
      }

      const data = decode(parsed);
      if (data === null) {
        return { ok: false, message: `Unexpected response from ${method} ${path}`, data: null };
      }

      return { ok: true, message: successMessage(data), data };
    } catch (error) {
      return { ok: false, message: `Error ${activity}: ${describeError(error)}`, data: null };
    }
  }

  /**
   * Call an endpoint where only the status matters
   */
  private async command(
    activity: string,
    method: HttpMethod,
    path: string,
    successMessage: string,
    body?: unknown
  ): Promise<ApiStatus> {
    try {
      const response = await this.send(method, path, body);

      if (!response.ok) {
        const raw = await response.text();
        return { ok: false, message: `Error: HTTP ${response.status} - ${raw}` };
      }

      return { ok: true, message: successMessage };
    } catch (error) {
      return { ok: false, message: `Error ${activity}: ${describeError(error)}` };
    }
  }

  private send(method: HttpMethod, path: string, body: unknown): Promise<Response> {
    const headers: Record<string, string> = { 'x-api-key': this.apiKey };
    const init: RequestInit = { method, headers };

    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(body);
    }

    return this.fetchImpl(`${this.baseUrl}${path}`, init);
  }
}
