import type { ProviderNode } from "./token"

export type MissingNode = {
  label: string
  from?: ProviderNode
}

/**
 * Graphviz DOT for a provider graph. Edges point from a dependent to its
 * dependency; invocations are boxes, missing providers dashed.
 */
export function renderDot(
  nodes: readonly ProviderNode[],
  failed: ReadonlySet<string>,
  missing: readonly MissingNode[],
): string {
  const lines = ["digraph {", "\trankdir=RL;"]

  for (const node of nodes) {
    const attrs = [
      `label=${quote(node.label)}`,
      ...(node.kind === "invocation" ? ["shape=box"] : []),
      ...(failed.has(node.label) ? ["color=red"] : []),
    ]

    lines.push(`\tn${node.id} [${attrs.join(" ")}];`)
  }

  missing.forEach((m, i) => {
    lines.push(`\tm${i} [label=${quote(m.label)} color=red style=dashed];`)
  })

  for (const node of nodes) {
    for (const dep of node.edges) {
      lines.push(`\tn${node.id} -> n${dep.id};`)
    }
  }

  missing.forEach((m, i) => {
    if (m.from) lines.push(`\tn${m.from.id} -> m${i};`)
  })

  lines.push("}")

  return lines.join("\n")
}

function quote(label: string): string {
  return `"${label.replaceAll("\\", "\\\\").replaceAll('"', '\\"')}"`
}
