import { DirectedGraph } from 'graphology';
import { toUndirected } from 'graphology-operators';
import type { ParticipantProfile, RelationshipGraph } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

type RelationshipSource = Pick<ParticipantProfile, 'sourceEntityUri' | 'relationships'>;

/**
 * Symmetric adjacency from one-directional relationship declarations.
 *
 * Edges are keyed by each profile's source entity URI. Every profile is a node;
 * targets that are not profiles become nodes too. Self-references are dropped.
 * Neighbor lists are sorted.
 */
export function buildRelationshipGraph(profiles: readonly RelationshipSource[]): RelationshipGraph {
    const graph = new DirectedGraph({ allowSelfLoops: false });

    for (const profile of profiles) {
        graph.mergeNode(profile.sourceEntityUri);
    }

    let skipped = 0;
    for (const profile of profiles) {
        const source = profile.sourceEntityUri;
        for (const rel of profile.relationships) {
            if (rel.targetId === source) {
                skipped++;
                continue;
            }
            graph.mergeEdge(source, rel.targetId, { kind: rel.kind });
        }
    }

    const undirected = toUndirected(graph);

    const adjacency: Record<string, readonly string[]> = {};
    undirected.forEachNode((node) => {
        adjacency[node] = Object.freeze([...undirected.neighbors(node)].sort());
    });

    getLogger().debug(
        { nodeCount: undirected.order, edgeCount: undirected.size, selfReferencesSkipped: skipped },
        'Relationship graph built'
    );
    return Object.freeze(adjacency);
}
