/**
 * Type definitions for the navigator and its MCP server
 */

// Entities a navigation node can be derived from
export type EntityKind = 'route' | 'stop' | 'trip';

// The whole feed is the root; every other node is derived from one entity
export type NodeKind = 'feed' | EntityKind;

// Collections addressable from any node
export type CollectionName = 'stops' | 'routes' | 'trips';

// Where the feed archive comes from
export type FeedSource = { kind: 'url'; url: string } | { kind: 'file'; path: string };

export interface NavigatorConfig {
  feedSource: FeedSource;
  cacheDir: string;
  cacheMaxAgeMs: number;
}

// MCP tool response; a type alias so it stays assignable to the SDK's open result objects
export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};
