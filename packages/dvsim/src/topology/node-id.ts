export type NodeId = string

/** Total order on node ids, used for tie-breaking and report ordering. */
export function compareNodeIds(a: NodeId, b: NodeId): number {
	if (a < b) return -1
	if (a > b) return 1
	return 0
}

export function sortNodeIds(ids: Iterable<NodeId>): NodeId[] {
	return Array.from(ids).sort(compareNodeIds)
}
