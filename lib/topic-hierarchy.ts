/**
 * Topic hierarchy builder.
 *
 * Turns a model's nested topic proposal into a pre-ordered list of topic drafts:
 * - depth is capped at three levels (category -> subtopic -> leaf)
 * - every leaf must look question-worthy
 * - sibling titles must be distinct after case and stopword folding
 * - leaf prerequisites must not form a cycle
 *
 * A proposal with issues is re-requested with a stricter prompt. Once the attempt
 * budget is spent, the proposal with the fewest issues is normalized and accepted.
 */

import type { TopicProposal, TopicProposalNode } from "@/lib/schema";
import type { LayoutPosition, TopicDraft } from "@/lib/study-types";
import {
  GenerationError,
  HierarchyValidationError,
  PrerequisiteCycleError,
  type HierarchyIssue,
} from "@/lib/study-errors";

export const MAX_TOPIC_DEPTH = 3;

const LAYOUT_COLUMN_WIDTH = 280;
const LAYOUT_ROW_HEIGHT = 120;

const STOPWORDS = new Set([
  "a", "an", "the", "and", "or", "of", "in", "on", "to", "for", "with", "by", "at",
  "from", "into", "vs", "versus", "its", "their", "about", "as", "is", "are", "part",
]);

export type QuestionWorthinessPolicy = {
  minTitleChars: number;
  minDescriptionChars: number;
  trivialTitles: ReadonlySet<string>;
};

export const DEFAULT_WORTHINESS_POLICY: QuestionWorthinessPolicy = {
  minTitleChars: 3,
  minDescriptionChars: 15,
  trivialTitles: new Set(["misc", "miscellaneous", "other", "others", "general", "references", "appendix", "index"]),
};

// Signature used for sibling comparison: sorted content tokens.
export function titleSignature(title: string): string {
  const tokens = title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .split(" ")
    .filter((token) => token && !STOPWORDS.has(token));
  return Array.from(new Set(tokens)).sort().join(" ");
}

const childrenOf = (node: TopicProposalNode): TopicProposalNode[] => node.subtopics ?? [];

export function isQuestionWorthy(node: TopicProposalNode, policy = DEFAULT_WORTHINESS_POLICY): boolean {
  const title = node.title.trim();
  const description = (node.description ?? "").trim();
  if (title.length < policy.minTitleChars) return false;
  if (!titleSignature(title)) return false;
  if (policy.trivialTitles.has(title.toLowerCase())) return false;
  return description.length >= policy.minDescriptionChars;
}

/**
 * Finds a cycle in a prerequisite graph (node -> nodes it depends on).
 * Returns the nodes along the cycle with the first node repeated at the end, or null.
 */
export function findPrerequisiteCycle(graph: ReadonlyMap<string, readonly string[]>): string[] | null {
  const state = new Map<string, "visiting" | "done">();
  const stack: string[] = [];

  const visit = (node: string): string[] | null => {
    const mark = state.get(node);
    if (mark === "done") return null;
    if (mark === "visiting") {
      const start = stack.indexOf(node);
      return [...stack.slice(start), node];
    }
    state.set(node, "visiting");
    stack.push(node);
    for (const dep of graph.get(node) ?? []) {
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    stack.pop();
    state.set(node, "done");
    return null;
  };

  for (const node of graph.keys()) {
    const cycle = visit(node);
    if (cycle) return cycle;
  }
  return null;
}

export function assertAcyclic(graph: ReadonlyMap<string, readonly string[]>): void {
  const cycle = findPrerequisiteCycle(graph);
  if (cycle) throw new PrerequisiteCycleError(cycle);
}

type LeafRef = { title: string; signature: string; prerequisites: string[] };

function collectLeaves(nodes: TopicProposalNode[], depth = 1, out: LeafRef[] = []): LeafRef[] {
  for (const node of nodes) {
    const children = childrenOf(node);
    if (children.length === 0 || depth >= MAX_TOPIC_DEPTH) {
      out.push({ title: node.title, signature: titleSignature(node.title), prerequisites: node.prerequisites ?? [] });
    } else {
      collectLeaves(children, depth + 1, out);
    }
  }
  return out;
}

// Leaf prerequisite graph keyed by title signature; unknown and self references are dropped.
function prerequisiteGraph(leaves: LeafRef[]): Map<string, string[]> {
  const known = new Set(leaves.map((leaf) => leaf.signature));
  const graph = new Map<string, string[]>();
  for (const leaf of leaves) {
    const deps = leaf.prerequisites
      .map(titleSignature)
      .filter((sig) => sig && sig !== leaf.signature && known.has(sig));
    graph.set(leaf.signature, Array.from(new Set(deps)));
  }
  return graph;
}

export function validateProposal(
  proposal: TopicProposal,
  policy: QuestionWorthinessPolicy = DEFAULT_WORTHINESS_POLICY
): HierarchyIssue[] {
  const issues: HierarchyIssue[] = [];

  const walk = (nodes: TopicProposalNode[], depth: number, parentPath: string) => {
    const seen = new Map<string, string>();
    for (const node of nodes) {
      const path = parentPath ? `${parentPath} > ${node.title}` : node.title;
      const signature = titleSignature(node.title);
      const twin = seen.get(signature);
      if (twin !== undefined) {
        issues.push({
          kind: "duplicate_sibling",
          path,
          message: `"${node.title}" repeats its sibling "${twin}"`,
        });
      } else {
        seen.set(signature, node.title);
      }

      const children = childrenOf(node);
      if (children.length > 0 && depth >= MAX_TOPIC_DEPTH) {
        issues.push({
          kind: "too_deep",
          path,
          message: `nested deeper than ${MAX_TOPIC_DEPTH} levels`,
        });
      } else if (children.length > 0) {
        walk(children, depth + 1, path);
      } else if (!isQuestionWorthy(node, policy)) {
        issues.push({
          kind: "not_question_worthy",
          path,
          message: "leaf is too narrow or vague to support a full question set",
        });
      }
    }
  };

  walk(proposal.categories, 1, "");

  const cycle = findPrerequisiteCycle(prerequisiteGraph(collectLeaves(proposal.categories)));
  if (cycle) {
    issues.push({
      kind: "prerequisite_cycle",
      path: cycle[0] ?? "",
      message: `prerequisites loop back on themselves (${cycle.length - 1} topics)`,
    });
  }

  return issues;
}

function collapsedDescription(node: TopicProposalNode): string | null {
  const titles: string[] = [];
  const gather = (nodes: TopicProposalNode[]) => {
    for (const child of nodes) {
      titles.push(child.title.trim());
      gather(childrenOf(child));
    }
  };
  gather(childrenOf(node));
  const base = (node.description ?? "").trim();
  if (titles.length === 0) return base || null;
  const covers = `Covers: ${titles.join(", ")}.`;
  return base ? `${base} ${covers}` : covers;
}

/**
 * Normalizes a proposal into pre-ordered drafts. Levels below the cap are collapsed into
 * their parent, later near-duplicate siblings are dropped and prerequisite cycles are broken.
 */
export function normalizeProposal(proposal: TopicProposal): TopicDraft[] {
  const drafts: TopicDraft[] = [];
  const prerequisiteTitles = new Map<string, string[]>();
  let row = 0;

  const place = (depth: number): LayoutPosition => ({
    x: (depth - 1) * LAYOUT_COLUMN_WIDTH,
    y: row++ * LAYOUT_ROW_HEIGHT,
  });

  const emit = (nodes: TopicProposalNode[], depth: number, parentKey: string | null) => {
    const seen = new Set<string>();
    for (const node of nodes) {
      const signature = titleSignature(node.title);
      if (seen.has(signature)) {
        console.warn("[topic-hierarchy] dropping duplicate sibling", { title: node.title });
        continue;
      }
      seen.add(signature);

      const children = childrenOf(node);
      const isCategory = children.length > 0 && depth < MAX_TOPIC_DEPTH;
      const key = `t${drafts.length + 1}`;
      const description = isCategory ? (node.description ?? "").trim() || null : collapsedDescription(node);

      drafts.push({
        key,
        parentKey,
        title: node.title.trim(),
        description,
        isCategory,
        depth,
        position: place(depth),
        prerequisiteKeys: [],
        content: null,
      });
      if (!isCategory) prerequisiteTitles.set(key, node.prerequisites ?? []);
      else emit(children, depth + 1, key);
    }
  };

  emit(proposal.categories, 1, null);

  const leaves = drafts.filter((draft) => !draft.isCategory);
  const leafBySignature = new Map<string, TopicDraft>();
  for (const leaf of leaves) {
    const signature = titleSignature(leaf.title);
    if (!leafBySignature.has(signature)) leafBySignature.set(signature, leaf);
  }

  for (const leaf of leaves) {
    const keys = new Set<string>();
    for (const title of prerequisiteTitles.get(leaf.key) ?? []) {
      const target = leafBySignature.get(titleSignature(title));
      if (target && target.key !== leaf.key) keys.add(target.key);
    }
    leaf.prerequisiteKeys = Array.from(keys);
  }

  breakPrerequisiteCycles(leaves);
  return drafts;
}

export function prerequisiteKeyGraph(topics: readonly TopicDraft[]): Map<string, string[]> {
  return new Map(topics.filter((topic) => !topic.isCategory).map((leaf) => [leaf.key, leaf.prerequisiteKeys]));
}

function breakPrerequisiteCycles(leaves: TopicDraft[]) {
  const byKey = new Map(leaves.map((leaf) => [leaf.key, leaf]));
  for (;;) {
    const cycle = findPrerequisiteCycle(prerequisiteKeyGraph(leaves));
    if (!cycle) return;
    // Drop the edge that closes the loop.
    const from = byKey.get(cycle[cycle.length - 2] ?? "");
    const to = cycle[cycle.length - 1];
    if (!from) throw new PrerequisiteCycleError(cycle);
    from.prerequisiteKeys = from.prerequisiteKeys.filter((key) => key !== to);
    console.warn("[topic-hierarchy] removed cyclic prerequisite", { from: from.title, to: byKey.get(to ?? "")?.title });
  }
}

export type HierarchyBuildOptions = {
  maxAttempts: number;
  policy?: QuestionWorthinessPolicy;
};

export type HierarchyBuildResult = {
  title: string | null;
  topics: TopicDraft[];
  issues: HierarchyIssue[];
  attempts: number;
};

/**
 * Requests proposals until one validates or the attempt budget is spent.
 * `propose` receives the issues of the previous attempt (empty on the first call).
 * A generation failure on a retry falls back to the best proposal seen so far.
 */
export async function buildTopicHierarchy(
  propose: (previousIssues: HierarchyIssue[]) => Promise<TopicProposal>,
  options: HierarchyBuildOptions
): Promise<HierarchyBuildResult> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  let best: { proposal: TopicProposal; issues: HierarchyIssue[] } | null = null;
  let previousIssues: HierarchyIssue[] = [];
  let attempts = 0;

  while (attempts < maxAttempts) {
    attempts += 1;
    let proposal: TopicProposal;
    try {
      proposal = await propose(previousIssues);
    } catch (err) {
      if (best && err instanceof GenerationError) {
        console.warn("[topic-hierarchy] retry failed, keeping best proposal", { attempts, error: err.message });
        break;
      }
      throw err;
    }

    const issues = validateProposal(proposal, options.policy);
    if (!best || issues.length < best.issues.length) best = { proposal, issues };
    if (issues.length === 0) break;

    const rejection = new HierarchyValidationError(issues);
    console.warn("[topic-hierarchy] proposal rejected", {
      attempt: attempts,
      message: rejection.message,
      kinds: Array.from(new Set(issues.map((issue) => issue.kind))),
    });
    previousIssues = issues;
  }

  if (!best) throw new HierarchyValidationError([]);

  if (best.issues.length > 0) {
    console.warn("[topic-hierarchy] accepting hierarchy with quality issues", {
      attempts,
      issues: best.issues.length,
    });
  }

  const topics = normalizeProposal(best.proposal);
  if (!topics.some((topic) => !topic.isCategory)) {
    throw new HierarchyValidationError(best.issues);
  }

  return { title: best.proposal.title ?? null, topics, issues: best.issues, attempts };
}
