import type { StudyTopic, TopicNode } from "@/lib/study-types";

// Nests pre-ordered topics under their parents, keeping sibling order.
export function buildTopicTree(topics: StudyTopic[]): TopicNode[] {
  const nodes = new Map<string, TopicNode>();
  const roots: TopicNode[] = [];

  for (const topic of [...topics].sort((a, b) => a.orderIndex - b.orderIndex)) {
    const { sessionId: _sessionId, ...rest } = topic;
    const node: TopicNode = { ...rest, children: [] };
    nodes.set(topic.id, node);
    const parent = topic.parentId ? nodes.get(topic.parentId) : undefined;
    if (parent) parent.children.push(node);
    else roots.push(node);
  }
  return roots;
}

export function leavesInOrder<T extends Pick<StudyTopic, "isCategory" | "orderIndex">>(topics: T[]): T[] {
  return topics.filter((topic) => !topic.isCategory).sort((a, b) => a.orderIndex - b.orderIndex);
}
