/**
 * sysindex Kernel — System Index Definitions
 *
 * Request bodies for the primary index and the notifications template.
 * The kernel does not interpret mapping content; it only ships it.
 */

import type { InstallerConfig } from '../types/config.js';
import {
  latestPrimaryIndexName,
  notificationsIndexPattern,
  notificationsReadAlias,
  notificationsTemplateName,
} from '../types/config.js';
import type {
  CreateIndexRequest,
  IndexMappings,
  IndexSettings,
  PutTemplateRequest,
} from '../types/store.js';

/** Settings shared by every system index: one shard, hidden, at most one replica. */
export function systemIndexSettings(): IndexSettings {
  return {
    'index.number_of_shards': 1,
    'index.auto_expand_replicas': '0-1',
    'index.hidden': true,
  };
}

export function primaryIndexMappings(config: InstallerConfig): IndexMappings {
  return {
    dynamic: 'false',
    _meta: { version: config.release_id },
    properties: {
      id: { type: 'keyword' },
      doc_type: { type: 'keyword' },
      description: { type: 'text' },
      create_time: { type: 'date' },
      version: { type: 'keyword' },
      settings: { type: 'object', enabled: false },
    },
  };
}

export function notificationsMappings(config: InstallerConfig): IndexMappings {
  return {
    dynamic: 'false',
    _meta: { version: config.release_id },
    properties: {
      resource_id: { type: 'keyword' },
      message: {
        type: 'text',
        fields: { raw: { type: 'keyword' } },
      },
      level: { type: 'keyword' },
      timestamp: { type: 'date' },
      node_name: { type: 'keyword' },
    },
  };
}

export function createPrimaryIndexRequest(config: InstallerConfig): CreateIndexRequest {
  return {
    index: latestPrimaryIndexName(config),
    settings: systemIndexSettings(),
    mappings: primaryIndexMappings(config),
    aliases: [],
  };
}

/**
 * The template is sent with `create: false` so that an older template left
 * by a previous release is replaced rather than reported as present.
 */
export function notificationsTemplateRequest(config: InstallerConfig): PutTemplateRequest {
  return {
    name: notificationsTemplateName(config),
    create: false,
    version: config.release_id,
    index_patterns: [notificationsIndexPattern(config)],
    settings: systemIndexSettings(),
    mappings: notificationsMappings(config),
    aliases: [notificationsReadAlias(config)],
  };
}
