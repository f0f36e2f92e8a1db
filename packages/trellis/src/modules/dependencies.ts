/**
 * Dependency Resolver - derive execution order from $steps references.
 */

import { TrellisError, ERROR_CODES } from '../errors.js';
import { isJsonObject } from '../types.js';
import type { ExecutionPlan, Experiment, JsonValue, StepDefinition } from '../types.js';

const STEP_REFERENCE = /^\$steps\.([a-zA-Z_][a-zA-Z0-9_]*)\.([a-zA-Z_][a-zA-Z0-9_]*)/;

const RULE = '─'.repeat(50);

type Color = 'white' | 'gray' | 'black';

export class DependencyResolver {
  private readonly stepsById: Map<string, StepDefinition>;

  constructor(private readonly experiment: Experiment) {
    this.stepsById = new Map(experiment.steps.map(step => [step.id, step]));
  }

  /**
   * Step ids referenced by a value, walking nested lists and maps.
   */
  extractReferences(value: JsonValue): Set<string> {
    const refs = new Set<string>();
    if (typeof value === 'string') {
      const match = STEP_REFERENCE.exec(value);
      if (match) refs.add(match[1]);
    } else if (Array.isArray(value)) {
      for (const item of value) {
        for (const ref of this.extractReferences(item)) refs.add(ref);
      }
    } else if (isJsonObject(value)) {
      for (const item of Object.values(value)) {
        for (const ref of this.extractReferences(item)) refs.add(ref);
      }
    }
    return refs;
  }

  /**
   * step id -> ids of the steps it depends on, from inputs and params.
   */
  buildDependencyGraph(): Map<string, Set<string>> {
    const graph = new Map<string, Set<string>>();
    const available = [...this.stepsById.keys()].sort();

    for (const step of this.experiment.steps) {
      const dependencies = new Set<string>();
      for (const ref of Object.values(step.inputs)) {
        for (const dep of this.extractReferences(ref)) dependencies.add(dep);
      }
      for (const value of Object.values(step.params)) {
        for (const dep of this.extractReferences(value)) dependencies.add(dep);
      }

      for (const dep of dependencies) {
        if (!this.stepsById.has(dep)) {
          throw new TrellisError(
            'GraphError',
            ERROR_CODES.E2001,
            `Step '${step.id}' references unknown step '${dep}'. Available steps: ${available.join(', ')}`,
            { value: dep, stepId: step.id, available }
          );
        }
      }
      graph.set(step.id, dependencies);
    }
    return graph;
  }

  /**
   * Three-color DFS. Returns the cycle in data-flow order, starting and
   * ending on the same step, or null.
   */
  detectCycle(graph: Map<string, Set<string>>): string[] | null {
    const color = new Map<string, Color>();
    const parent = new Map<string, string>();
    for (const node of graph.keys()) color.set(node, 'white');

    const dfs = (node: string): string[] | null => {
      color.set(node, 'gray');
      const neighbors = [...(graph.get(node) ?? [])].sort();
      for (const neighbor of neighbors) {
        const state = color.get(neighbor);
        if (state === 'gray') {
          const cycle = [neighbor];
          let current: string | undefined = node;
          while (current !== undefined && current !== neighbor) {
            cycle.push(current);
            current = parent.get(current);
          }
          cycle.push(neighbor);
          return cycle;
        }
        if (state === 'white') {
          parent.set(neighbor, node);
          const found = dfs(neighbor);
          if (found) return found;
        }
      }
      color.set(node, 'black');
      return null;
    };

    for (const node of graph.keys()) {
      if (color.get(node) === 'white') {
        const found = dfs(node);
        if (found) return found;
      }
    }
    return null;
  }

  /**
   * Kahn's algorithm with a lexicographically sorted ready queue.
   */
  topologicalSort(graph: Map<string, Set<string>>): string[] {
    const cycle = this.detectCycle(graph);
    if (cycle) {
      throw new TrellisError(
        'GraphError',
        ERROR_CODES.E2002,
        `Circular dependency detected in experiment steps: ${cycle.join(' -> ')}. Each step in this cycle depends on another step in the cycle.`,
        { cycle, value: cycle.join(' -> ') }
      );
    }

    const inDegree = new Map<string, number>();
    for (const [node, deps] of graph) inDegree.set(node, deps.size);

    const queue = [...graph.keys()].filter(node => inDegree.get(node) === 0).sort();
    const order: string[] = [];

    while (queue.length > 0) {
      const node = queue.shift();
      if (node === undefined) break;
      order.push(node);
      for (const [other, deps] of graph) {
        if (!deps.has(node)) continue;
        const remaining = (inDegree.get(other) ?? 0) - 1;
        inDegree.set(other, remaining);
        if (remaining === 0) {
          queue.push(other);
          queue.sort();
        }
      }
    }

    if (order.length !== graph.size) {
      const remaining = [...graph.keys()].filter(node => !order.includes(node));
      throw new Error(`Topological sort incomplete. Remaining steps: ${remaining.join(', ')}`);
    }
    return order;
  }

  createExecutionPlan(): ExecutionPlan {
    const dependencyGraph = this.buildDependencyGraph();
    return {
      stepsInOrder: this.topologicalSort(dependencyGraph),
      dependencyGraph,
    };
  }

  /**
   * Human-readable listing of the plan.
   */
  visualize(plan: ExecutionPlan = this.createExecutionPlan()): string {
    const lines = [
      `Experiment: ${this.experiment.name}`,
      `ID: ${this.experiment.id}`,
      `Steps: ${this.experiment.steps.length}`,
      '',
      'Execution Order:',
      RULE,
    ];

    plan.stepsInOrder.forEach((stepId, i) => {
      const step = this.stepsById.get(stepId);
      if (!step) return;
      const deps = [...(plan.dependencyGraph.get(stepId) ?? [])].sort();

      lines.push('');
      lines.push(`  ${i + 1}. ${stepId}`);
      lines.push(`     primitive: ${step.primitive}`);
      lines.push(deps.length > 0
        ? `     ← depends on: ${deps.join(', ')}`
        : '     ← (no dependencies, can run first)');

      const inputs = Object.entries(step.inputs);
      if (inputs.length > 0) {
        lines.push('     inputs:');
        for (const [name, ref] of inputs) {
          lines.push(`       ${name}: ${ref}`);
        }
      }

      const outputs = Object.entries(step.outputs);
      if (outputs.length > 0) {
        lines.push(`     outputs: ${outputs.map(([k, v]) => `${k}: ${v}`).join(', ')}`);
      }
    });

    lines.push('');
    lines.push(RULE);
    return lines.join('\n');
  }

  /**
   * Steps no other step depends on.
   */
  static sinks(plan: ExecutionPlan): string[] {
    const consumed = new Set<string>();
    for (const deps of plan.dependencyGraph.values()) {
      for (const dep of deps) consumed.add(dep);
    }
    return plan.stepsInOrder.filter(id => !consumed.has(id));
  }
}
