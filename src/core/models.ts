/**
 * Read Models and Schemas
 *
 * Zod schemas for the API payloads and the immutable read models built
 * from them. Every read model carries the two formatters the list engines
 * render: a one-line label for menu rows and a multi-line detail view.
 *
 * - Replica: trained digital twin (user or system owned)
 * - Persona: conversational configuration, optionally bound to a replica
 * - Video: generated video and its delivery URLs
 * - Conversation: real-time session with a join URL
 *
 * @module models
 */

import { z } from 'zod';
import { formatTimestamp, inlineValue, preview } from './format.js';

// ============================================================================
// List Item Contract
// ============================================================================

/**
 * Anything the paginated list engines can render
 */
export interface ListItem {
  /** Identity, unique within its resource kind */
  readonly id: string;
  /** Resource kind, used for detail headings */
  readonly kind: string;
  /** Single-line label used in menu rows */
  displayShort(): string;
  /** Multi-line description used in detail views */
  displayVerbose(): string;
}

// Missing or null strings from the API are treated as empty
const text = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

const jsonObject = z
  .record(z.unknown())
  .nullish()
  .transform((value) => value ?? {});

// ============================================================================
// Replica
// ============================================================================

export const ReplicaPayloadSchema = z.object({
  replica_id: z.string(),
  replica_name: text,
  replica_type: text,
  status: text,
  training_progress: text,
  created_at: text,
  updated_at: text,
  thumbnail_video_url: optionalText,
});

export type ReplicaPayload = z.infer<typeof ReplicaPayloadSchema>;

export type ReplicaType = 'user' | 'system';

export interface ReplicaFields {
  id: string;
  name: string;
  type: string;
  status: string;
  trainingProgress: string;
  createdAt: string;
  updatedAt: string;
  thumbnailVideoUrl: string | null;
}

export class Replica implements ListItem {
  readonly kind = 'Replica';
  readonly id: string;
  readonly name: string;
  readonly type: string;
  readonly status: string;
  readonly trainingProgress: string;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly thumbnailVideoUrl: string | null;

  constructor(fields: ReplicaFields) {
    this.id = fields.id;
    this.name = fields.name;
    this.type = fields.type;
    this.status = fields.status;
    this.trainingProgress = fields.trainingProgress;
    this.createdAt = fields.createdAt;
    this.updatedAt = fields.updatedAt;
    this.thumbnailVideoUrl = fields.thumbnailVideoUrl;
  }

  static fromPayload(payload: ReplicaPayload): Replica {
    return new Replica({
      id: payload.replica_id,
      name: payload.replica_name,
      type: payload.replica_type,
      status: payload.status,
      trainingProgress: payload.training_progress,
      createdAt: payload.created_at,
      updatedAt: payload.updated_at,
      thumbnailVideoUrl: payload.thumbnail_video_url,
    });
  }

  private fields(): ReplicaFields {
    return {
      id: this.id,
      name: this.name,
      type: this.type,
      status: this.status,
      trainingProgress: this.trainingProgress,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
      thumbnailVideoUrl: this.thumbnailVideoUrl,
    };
  }

  withName(name: string): Replica {
    return new Replica({ ...this.fields(), name });
  }

  isUser(): boolean {
    return this.type === 'user';
  }

  isSystem(): boolean {
    return this.type === 'system';
  }

  isCompleted(): boolean {
    return this.status === 'completed';
  }

  isTraining(): boolean {
    return this.status === 'training';
  }

  /**
   * Training percentage from a `current/total` progress string ("50/100" -> 50)
   */
  trainingPercentage(): number {
    const parts = this.trainingProgress.split('/');
    if (parts.length !== 2) return 0;

    const current = Number(parts[0]);
    const total = Number(parts[1]);
    if (!Number.isInteger(current) || !Number.isInteger(total) || total === 0) {
      return 0;
    }
    return Math.trunc((current / total) * 100);
  }

  displayShort(): string {
    const icon = this.isCompleted() ? '✅' : this.isTraining() ? '🔄' : '❌';
    return `${icon} ${this.name} (${this.id}) - ${this.status} - ${this.trainingProgress}`;
  }

  displayVerbose(): string {
    const lines = [
      'Replica Details:',
      `  ID: ${this.id}`,
      `  Name: ${this.name}`,
      `  Type: ${this.type}`,
      `  Status: ${this.status}`,
      `  Training Progress: ${this.trainingProgress}`,
      `  Created: ${this.createdAt}`,
    ];

    if (this.thumbnailVideoUrl) {
      lines.push(`  Thumbnail URL: ${this.thumbnailVideoUrl}`);
    }

    const created = formatTimestamp(this.createdAt);
    if (created) lines.push(`  Created Date: ${created}`);

    const updated = formatTimestamp(this.updatedAt);
    if (updated) lines.push(`  Updated Date: ${updated}`);

    lines.push(`  Training Percentage: ${this.trainingPercentage()}%`);
    return lines.join('\n');
  }
}

// ============================================================================
// Persona
// ============================================================================

export const PersonaPayloadSchema = z.object({
  persona_id: z.string(),
  persona_name: text,
  default_replica_id: text,
  created_at: text,
  updated_at: text,
  system_prompt: optionalText,
  context: optionalText,
  layers: jsonObject,
});

export type PersonaPayload = z.infer<typeof PersonaPayloadSchema>;

export type PersonaType = 'user' | 'system';

export interface PersonaFields {
  id: string;
  name: string;
  defaultReplicaId: string;
  createdAt: string;
  updatedAt: string;
  systemPrompt: string | null;
  context: string | null;
  layers: Record<string, unknown>;
}

export class Persona implements ListItem {
  readonly kind = 'Persona';
  readonly id: string;
  readonly name: string;
  readonly defaultReplicaId: string;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly systemPrompt: string | null;
  readonly context: string | null;
  readonly layers: Readonly<Record<string, unknown>>;

  constructor(fields: PersonaFields) {
    this.id = fields.id;
    this.name = fields.name;
    this.defaultReplicaId = fields.defaultReplicaId;
    this.createdAt = fields.createdAt;
    this.updatedAt = fields.updatedAt;
    this.systemPrompt = fields.systemPrompt;
    this.context = fields.context;
    this.layers = fields.layers;
  }

  static fromPayload(payload: PersonaPayload): Persona {
    return new Persona({
      id: payload.persona_id,
      name: payload.persona_name,
      defaultReplicaId: payload.default_replica_id,
      createdAt: payload.created_at,
      updatedAt: payload.updated_at,
      systemPrompt: payload.system_prompt,
      context: payload.context,
      layers: payload.layers,
    });
  }

  withName(name: string): Persona {
    return new Persona({
      id: this.id,
      name,
      defaultReplicaId: this.defaultReplicaId,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
      systemPrompt: this.systemPrompt,
      context: this.context,
      layers: { ...this.layers },
    });
  }

  hasDefaultReplica(): boolean {
    return this.defaultReplicaId.trim().length > 0;
  }

  systemPromptPreview(maxLength = 100): string {
    return this.systemPrompt ? preview(this.systemPrompt, maxLength) : 'No system prompt';
  }

  contextPreview(maxLength = 100): string {
    return this.context ? preview(this.context, maxLength) : 'No context';
  }

  displayShort(): string {
    const indicator = this.hasDefaultReplica() ? '🔗' : '🔴';
    return `${indicator} ${this.name} (${this.id}) - Default Replica: ${this.defaultReplicaId || 'None'}`;
  }

  displayVerbose(): string {
    const lines = [
      'Persona Details:',
      `  ID: ${this.id}`,
      `  Name: ${this.name}`,
      `  Default Replica ID: ${this.defaultReplicaId || 'None'}`,
    ];

    const created = formatTimestamp(this.createdAt);
    if (created) lines.push(`  Created Date: ${created}`);

    const updated = formatTimestamp(this.updatedAt);
    if (updated) lines.push(`  Updated Date: ${updated}`);

    lines.push(`  System Prompt: ${this.systemPromptPreview(1000)}`);
    lines.push(`  Context: ${this.contextPreview(1000)}`);

    const layerNames = Object.keys(this.layers);
    if (layerNames.length === 0) {
      lines.push('  Layers: None configured');
      return lines.join('\n');
    }

    lines.push(`  Layers: ${layerNames.length} configured`);
    for (const [name, layer] of Object.entries(this.layers)) {
      lines.push(`    - ${name}:`);
      if (layer !== null && typeof layer === 'object' && !Array.isArray(layer)) {
        for (const [key, value] of Object.entries(layer)) {
          lines.push(`      ${key}: ${inlineValue(value)}`);
        }
      } else {
        lines.push(`      ${inlineValue(layer)}`);
      }
    }
    return lines.join('\n');
  }
}

// ============================================================================
// Video
// ============================================================================

export const VideoPayloadSchema = z.object({
  video_id: z.string(),
  video_name: text,
  status: text,
  created_at: text,
  updated_at: optionalText,
  data: jsonObject,
  download_url: optionalText,
  stream_url: optionalText,
  hosted_url: optionalText,
  status_details: optionalText,
  still_image_thumbnail_url: optionalText,
  gif_thumbnail_url: optionalText,
});

export type VideoPayload = z.infer<typeof VideoPayloadSchema>;

export interface VideoFields {
  id: string;
  name: string;
  status: string;
  createdAt: string;
  updatedAt: string | null;
  data: Record<string, unknown>;
  downloadUrl: string | null;
  streamUrl: string | null;
  hostedUrl: string | null;
  statusDetails: string | null;
  stillImageThumbnailUrl: string | null;
  gifThumbnailUrl: string | null;
}

export class Video implements ListItem {
  readonly kind = 'Video';
  readonly id: string;
  readonly name: string;
  readonly status: string;
  readonly createdAt: string;
  readonly updatedAt: string | null;
  readonly data: Readonly<Record<string, unknown>>;
  readonly downloadUrl: string | null;
  readonly streamUrl: string | null;
  readonly hostedUrl: string | null;
  readonly statusDetails: string | null;
  readonly stillImageThumbnailUrl: string | null;
  readonly gifThumbnailUrl: string | null;

  constructor(fields: VideoFields) {
    this.id = fields.id;
    this.name = fields.name;
    this.status = fields.status;
    this.createdAt = fields.createdAt;
    this.updatedAt = fields.updatedAt;
    this.data = fields.data;
    this.downloadUrl = fields.downloadUrl;
    this.streamUrl = fields.streamUrl;
    this.hostedUrl = fields.hostedUrl;
    this.statusDetails = fields.statusDetails;
    this.stillImageThumbnailUrl = fields.stillImageThumbnailUrl;
    this.gifThumbnailUrl = fields.gifThumbnailUrl;
  }

  static fromPayload(payload: VideoPayload): Video {
    return new Video({
      id: payload.video_id,
      name: payload.video_name,
      status: payload.status,
      createdAt: payload.created_at,
      updatedAt: payload.updated_at,
      data: payload.data,
      downloadUrl: payload.download_url,
      streamUrl: payload.stream_url,
      hostedUrl: payload.hosted_url,
      statusDetails: payload.status_details,
      stillImageThumbnailUrl: payload.still_image_thumbnail_url,
      gifThumbnailUrl: payload.gif_thumbnail_url,
    });
  }

  withName(name: string): Video {
    return new Video({
      id: this.id,
      name,
      status: this.status,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
      data: { ...this.data },
      downloadUrl: this.downloadUrl,
      streamUrl: this.streamUrl,
      hostedUrl: this.hostedUrl,
      statusDetails: this.statusDetails,
      stillImageThumbnailUrl: this.stillImageThumbnailUrl,
      gifThumbnailUrl: this.gifThumbnailUrl,
    });
  }

  isReady(): boolean {
    return this.status === 'ready';
  }

  isGenerating(): boolean {
    return this.status === 'generating';
  }

  isFailed(): boolean {
    return this.status === 'error';
  }

  script(): string | null {
    const script = this.data['script'];
    return typeof script === 'string' && script.length > 0 ? script : null;
  }

  scriptPreview(maxLength = 100): string {
    const script = this.script();
    return script ? preview(script, maxLength) : 'No script';
  }

  displayShort(): string {
    const icon = this.isReady() ? '✅' : this.isGenerating() ? '🔄' : this.isFailed() ? '❌' : '⏳';
    return `${icon} ${this.name} (${this.id}) - ${this.status}`;
  }

  displayVerbose(): string {
    const lines = [
      'Video Details:',
      `  ID: ${this.id}`,
      `  Name: ${this.name}`,
      `  Status: ${this.status}`,
      `  Created: ${this.createdAt}`,
      `  Updated: ${this.updatedAt ?? 'None'}`,
    ];

    const urls: [string, string | null][] = [
      ['Status Details', this.statusDetails],
      ['Download URL', this.downloadUrl],
      ['Stream URL', this.streamUrl],
      ['Hosted URL', this.hostedUrl],
      ['Still Image Thumbnail', this.stillImageThumbnailUrl],
      ['GIF Thumbnail', this.gifThumbnailUrl],
    ];
    for (const [label, value] of urls) {
      if (value) lines.push(`  ${label}: ${value}`);
    }

    const entries = Object.entries(this.data);
    if (entries.length === 0) {
      lines.push('  Data: None');
      return lines.join('\n');
    }

    lines.push(`  Data: ${entries.length} items`);
    for (const [key, value] of entries) {
      if (key === 'script') {
        lines.push(`    - Script: ${this.scriptPreview(10000)}`);
      } else {
        lines.push(`    - ${key}: ${inlineValue(value)}`);
      }
    }
    return lines.join('\n');
  }
}

// ============================================================================
// Conversation
// ============================================================================

export const ConversationPayloadSchema = z.object({
  conversation_id: z.string(),
  conversation_name: text,
  conversation_url: text,
  callback_url: optionalText,
  status: text,
  replica_id: text,
  persona_id: text,
  created_at: text,
  updated_at: text,
});

export type ConversationPayload = z.infer<typeof ConversationPayloadSchema>;

export interface ConversationFields {
  id: string;
  name: string;
  url: string;
  callbackUrl: string | null;
  status: string;
  replicaId: string;
  personaId: string;
  createdAt: string;
  updatedAt: string;
}

export class Conversation implements ListItem {
  readonly kind = 'Conversation';
  readonly id: string;
  readonly name: string;
  readonly url: string;
  readonly callbackUrl: string | null;
  readonly status: string;
  readonly replicaId: string;
  readonly personaId: string;
  readonly createdAt: string;
  readonly updatedAt: string;

  constructor(fields: ConversationFields) {
    this.id = fields.id;
    this.name = fields.name;
    this.url = fields.url;
    this.callbackUrl = fields.callbackUrl;
    this.status = fields.status;
    this.replicaId = fields.replicaId;
    this.personaId = fields.personaId;
    this.createdAt = fields.createdAt;
    this.updatedAt = fields.updatedAt;
  }

  static fromPayload(payload: ConversationPayload): Conversation {
    return new Conversation({
      id: payload.conversation_id,
      name: payload.conversation_name,
      url: payload.conversation_url,
      callbackUrl: payload.callback_url,
      status: payload.status,
      replicaId: payload.replica_id,
      personaId: payload.persona_id,
      createdAt: payload.created_at,
      updatedAt: payload.updated_at,
    });
  }

  withStatus(status: string): Conversation {
    return new Conversation({
      id: this.id,
      name: this.name,
      url: this.url,
      callbackUrl: this.callbackUrl,
      status,
      replicaId: this.replicaId,
      personaId: this.personaId,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    });
  }

  isActive(): boolean {
    return this.status === 'active';
  }

  displayShort(): string {
    return `${this.name} (${this.id}) - ${this.status}`;
  }

  displayVerbose(): string {
    const lines = [
      'Conversation Details:',
      `  ID: ${this.id}`,
      `  Name: ${this.name}`,
      `  URL: ${this.url}`,
      `  Status: ${this.status}`,
      `  Replica ID: ${this.replicaId}`,
      `  Persona ID: ${this.personaId}`,
      `  Created: ${this.createdAt}`,
      `  Updated: ${this.updatedAt}`,
    ];
    if (this.callbackUrl) {
      lines.push(`  Callback URL: ${this.callbackUrl}`);
    }
    return lines.join('\n');
  }
}
