import { CycleDetectedError, GraphError, UnknownDependencyError } from "../errors.js";
import type { TaskDefinition } from "./types.js";

/**
 * Immutable task graph. Holds only the requested roots and their transitive
 * dependencies; `tasksOrder` is computed once and lists every dependency
 * before its dependents.
 */
export class TaskGraph {
  readonly nodes: ReadonlyMap<string, Readonly<TaskDefinition>>;
  readonly tasksOrder: readonly string[];
  readonly rootNames: readonly string[];
  readonly longestTaskName: number;
  private readonly dependents: ReadonlyMap<string, readonly string[]>;

  constructor(
    nodes: Map<string, Readonly<TaskDefinition>>,
    tasksOrder: string[],
    rootNames: string[],
  ) {
    this.nodes = nodes;
    this.tasksOrder = Object.freeze([...tasksOrder]);
    this.rootNames = Object.freeze([...rootNames]);
    this.longestTaskName = tasksOrder.reduce((longest, name) => Math.max(longest, name.length), 0);

    const dependents = new Map<string, string[]>();
    for (const name of tasksOrder) dependents.set(name, []);
    for (const name of tasksOrder) {
      for (const dep of this.dependenciesOf(name)) {
        dependents.get(dep)?.push(name);
      }
    }
    this.dependents = dependents;
  }

  get size(): number {
    return this.nodes.size;
  }

  has(name: string): boolean {
    return this.nodes.has(name);
  }

  get(name: string): Readonly<TaskDefinition> {
    const task = this.nodes.get(name);
    if (!task) throw new GraphError("TASK_NOT_FOUND", `Task "${name}" is not part of the graph`);
    return task;
  }

  dependenciesOf(name: string): readonly string[] {
    return this.get(name).dependsOn;
  }

  dependentsOf(name: string): readonly string[] {
    return this.dependents.get(name) ?? [];
  }
}

/**
 * Build a task graph from definitions.
 *
 * `before` edges are folded into the dependency lists of the tasks they name,
 * so every node carries its full dependency set in `dependsOn`. An empty
 * `roots` list selects every task; a root naming a namespace (`ci`) selects
 * every `ci:*` task.
 */
export function createTaskGraph(definitions: TaskDefinition[], roots: string[] = []): TaskGraph {
  const all = normalize(definitions);

  const cycle = findCycle(all);
  if (cycle) throw new CycleDetectedError(cycle);

  const selected = selectRoots(all, roots);
  const closure = dependencyClosure(all, selected);

  const nodes = new Map<string, Readonly<TaskDefinition>>();
  for (const [name, task] of all) {
    if (closure.has(name)) nodes.set(name, Object.freeze(task));
  }

  const rootNames = roots.length > 0 ? roots : [...all.keys()];
  return new TaskGraph(nodes, topologicalOrder(nodes), rootNames);
}

function normalize(definitions: TaskDefinition[]): Map<string, TaskDefinition> {
  const all = new Map<string, TaskDefinition>();
  for (const def of definitions) {
    if (all.has(def.name)) {
      throw new GraphError("DUPLICATE_TASK", `Task "${def.name}" is defined more than once`);
    }
    all.set(def.name, { ...def, dependsOn: [...def.dependsOn] });
  }

  for (const task of all.values()) {
    for (const dep of task.dependsOn) {
      if (!all.has(dep)) throw new UnknownDependencyError(task.name, dep);
    }
  }

  for (const task of all.values()) {
    for (const target of task.before ?? []) {
      const dependent = all.get(target);
      if (!dependent) throw new UnknownDependencyError(task.name, target);
      if (!dependent.dependsOn.includes(task.name)) dependent.dependsOn.push(task.name);
    }
  }

  return all;
}

function selectRoots(all: Map<string, TaskDefinition>, roots: string[]): string[] {
  if (roots.length === 0) return [...all.keys()];

  const selected: string[] = [];
  for (const root of roots) {
    if (all.has(root)) {
      selected.push(root);
      continue;
    }
    const prefix = `${root}:`;
    const inNamespace = [...all.keys()].filter((name) => name.startsWith(prefix));
    if (inNamespace.length === 0) {
      throw new GraphError("TASK_NOT_FOUND", `No task or namespace named "${root}"`);
    }
    for (const name of inNamespace) selected.push(name);
  }
  return selected;
}

function dependencyClosure(all: Map<string, TaskDefinition>, start: string[]): Set<string> {
  const seen = new Set<string>();
  const stack = [...start];
  while (stack.length > 0) {
    const name = stack.pop();
    if (name === undefined || seen.has(name)) continue;
    seen.add(name);
    for (const dep of all.get(name)?.dependsOn ?? []) stack.push(dep);
  }
  return seen;
}

/** DFS with coloring; returns the cycle as a path, or undefined. */
function findCycle(all: Map<string, TaskDefinition>): string[] | undefined {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>();
  for (const name of all.keys()) color.set(name, WHITE);
  const path: string[] = [];

  function dfs(name: string): string[] | undefined {
    color.set(name, GRAY);
    path.push(name);
    for (const dep of all.get(name)?.dependsOn ?? []) {
      const c = color.get(dep);
      if (c === GRAY) {
        // back edge: the cycle is the path from dep to here, closed on dep
        return [...path.slice(path.indexOf(dep)), dep];
      }
      if (c === WHITE) {
        const found = dfs(dep);
        if (found) return found;
      }
    }
    path.pop();
    color.set(name, BLACK);
    return undefined;
  }

  for (const name of all.keys()) {
    if (color.get(name) === WHITE) {
      const found = dfs(name);
      if (found) return found;
    }
  }
  return undefined;
}

/** Kahn's algorithm; ties keep definition order. */
function topologicalOrder(nodes: Map<string, Readonly<TaskDefinition>>): string[] {
  const remaining = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const [name, task] of nodes) {
    remaining.set(name, task.dependsOn.length);
    for (const dep of task.dependsOn) {
      const list = dependents.get(dep) ?? [];
      list.push(name);
      dependents.set(dep, list);
    }
  }

  const position = new Map<string, number>();
  for (const name of nodes.keys()) position.set(name, position.size);
  const ready = new ReadyQueue((name) => position.get(name) ?? 0);
  for (const [name, count] of remaining) {
    if (count === 0) ready.push(name);
  }
  const order: string[] = [];

  for (let name = ready.pop(); name !== undefined; name = ready.pop()) {
    order.push(name);
    for (const next of dependents.get(name) ?? []) {
      const left = (remaining.get(next) ?? 0) - 1;
      remaining.set(next, left);
      if (left === 0) ready.push(next);
    }
  }

  return order;
}

/** Binary min-heap of task names, ordered by definition position. */
class ReadyQueue {
  private heap: string[] = [];
  private rank: (name: string) => number;

  constructor(rank: (name: string) => number) {
    this.rank = rank;
  }

  push(name: string): void {
    const heap = this.heap;
    heap.push(name);
    let i = heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.rank(heap[parent]) <= this.rank(heap[i])) break;
      [heap[parent], heap[i]] = [heap[i], heap[parent]];
      i = parent;
    }
  }

  pop(): string | undefined {
    const heap = this.heap;
    const top = heap[0];
    const last = heap.pop();
    if (heap.length === 0 || last === undefined) return top;
    heap[0] = last;
    let i = 0;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < heap.length && this.rank(heap[left]) < this.rank(heap[smallest])) smallest = left;
      if (right < heap.length && this.rank(heap[right]) < this.rank(heap[smallest])) smallest = right;
      if (smallest === i) return top;
      [heap[smallest], heap[i]] = [heap[i], heap[smallest]];
      i = smallest;
    }
  }
}
