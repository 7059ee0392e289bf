/**
 * Read Model Tests
 *
 * @module core/__tests__/models.test
 */

import { describe, it, expect } from 'vitest';
import {
  Conversation,
  ConversationPayloadSchema,
  Persona,
  PersonaPayloadSchema,
  Replica,
  ReplicaPayloadSchema,
  Video,
  VideoPayloadSchema,
} from '../models.js';

describe('Replica', () => {
  const replica = Replica.fromPayload(
    ReplicaPayloadSchema.parse({
      replica_id: 'r1',
      replica_name: 'Twin',
      replica_type: 'user',
      status: 'training',
      training_progress: '25/50',
      created_at: '2024-03-05T08:09:10Z',
      updated_at: null,
    })
  );

  it('maps payload fields and fills missing strings', () => {
    expect(replica.id).toBe('r1');
    expect(replica.updatedAt).toBe('');
    expect(replica.thumbnailVideoUrl).toBeNull();
    expect(replica.isUser()).toBe(true);
    expect(replica.isTraining()).toBe(true);
  });

  it('computes the training percentage', () => {
    expect(replica.trainingPercentage()).toBe(50);
    expect(replica.withName('x').trainingPercentage()).toBe(50);
    expect(new Replica({ ...fields(replica), trainingProgress: 'n/a' }).trainingPercentage()).toBe(0);
    expect(new Replica({ ...fields(replica), trainingProgress: '3/0' }).trainingPercentage()).toBe(0);
  });

  it('renders a status icon in its menu row', () => {
    expect(replica.displayShort()).toBe('🔄 Twin (r1) - training - 25/50');
    expect(new Replica({ ...fields(replica), status: 'completed' }).displayShort()).toBe(
      '✅ Twin (r1) - completed - 25/50'
    );
    expect(new Replica({ ...fields(replica), status: 'error' }).displayShort()).toBe('❌ Twin (r1) - error - 25/50');
  });

  it('renders details with formatted dates', () => {
    expect(replica.displayVerbose()).toBe(
      [
        'Replica Details:',
        '  ID: r1',
        '  Name: Twin',
        '  Type: user',
        '  Status: training',
        '  Training Progress: 25/50',
        '  Created: 2024-03-05T08:09:10Z',
        '  Created Date: 2024-03-05 08:09:10',
        '  Training Percentage: 50%',
      ].join('\n')
    );
  });

  it('returns a renamed copy', () => {
    const renamed = replica.withName('Twin 2');

    expect(renamed.name).toBe('Twin 2');
    expect(renamed.id).toBe('r1');
    expect(replica.name).toBe('Twin');
  });
});

function fields(replica: Replica) {
  return {
    id: replica.id,
    name: replica.name,
    type: replica.type,
    status: replica.status,
    trainingProgress: replica.trainingProgress,
    createdAt: replica.createdAt,
    updatedAt: replica.updatedAt,
    thumbnailVideoUrl: replica.thumbnailVideoUrl,
  };
}

describe('Persona', () => {
  it('lists configured layers in its details', () => {
    const persona = Persona.fromPayload(
      PersonaPayloadSchema.parse({
        persona_id: 'p1',
        persona_name: 'Coach',
        default_replica_id: 'r1',
        system_prompt: 'You coach runners.',
        layers: { llm: { model: 'small', speculative: true } },
      })
    );

    expect(persona.hasDefaultReplica()).toBe(true);
    expect(persona.displayShort()).toBe('🔗 Coach (p1) - Default Replica: r1');
    expect(persona.displayVerbose()).toBe(
      [
        'Persona Details:',
        '  ID: p1',
        '  Name: Coach',
        '  Default Replica ID: r1',
        '  System Prompt: You coach runners.',
        '  Context: No context',
        '  Layers: 1 configured',
        '    - llm:',
        '      model: small',
        '      speculative: true',
      ].join('\n')
    );
  });

  it('reports missing layers', () => {
    const persona = Persona.fromPayload(PersonaPayloadSchema.parse({ persona_id: 'p2' }));

    expect(persona.hasDefaultReplica()).toBe(false);
    expect(persona.displayVerbose()).toContain('  Layers: None configured');
    expect(persona.systemPromptPreview()).toBe('No system prompt');
  });
});

describe('Video', () => {
  it('shows the delivery URLs and data it has', () => {
    const video = Video.fromPayload(
      VideoPayloadSchema.parse({
        video_id: 'v1',
        video_name: 'Welcome',
        status: 'ready',
        created_at: '2024-01-01',
        hosted_url: 'https://example.test/v1',
        data: { script: 'Hello there', background: null },
      })
    );

    expect(video.displayShort()).toBe('✅ Welcome (v1) - ready');
    expect(video.displayVerbose()).toBe(
      [
        'Video Details:',
        '  ID: v1',
        '  Name: Welcome',
        '  Status: ready',
        '  Created: 2024-01-01',
        '  Updated: None',
        '  Hosted URL: https://example.test/v1',
        '  Data: 2 items',
        '    - Script: Hello there',
        '    - background: None',
      ].join('\n')
    );
  });

  it('picks an icon per status', () => {
    const video = Video.fromPayload(VideoPayloadSchema.parse({ video_id: 'v2', video_name: 'Draft', status: 'queued' }));

    expect(video.displayShort()).toBe('⏳ Draft (v2) - queued');
    expect(video.withName('Final').displayShort()).toBe('⏳ Final (v2) - queued');
  });
});

describe('Conversation', () => {
  const conversation = Conversation.fromPayload(
    ConversationPayloadSchema.parse({
      conversation_id: 'c1',
      conversation_name: 'Standup',
      conversation_url: 'https://example.test/c1',
      status: 'active',
      replica_id: 'r1',
    })
  );

  it('tracks whether it is active', () => {
    expect(conversation.isActive()).toBe(true);
    expect(conversation.withStatus('ended').isActive()).toBe(false);
    expect(conversation.status).toBe('active');
  });

  it('renders its menu row', () => {
    expect(conversation.displayShort()).toBe('Standup (c1) - active');
  });

  it('adds the callback URL to details only when set', () => {
    expect(conversation.displayVerbose()).not.toContain('Callback URL');
    expect(conversation.displayVerbose().split('\n')[3]).toBe('  URL: https://example.test/c1');
  });
});
