import { CircularDependencyError } from './errors.js';

/**
 * Граф зависимостей: имя задачи → имена задач, от которых она зависит.
 */
export type DependencyGraph = Record<string, string[]>;

function detectCycle(
  name: string,
  graph: DependencyGraph,
  visiting: Set<string>,
  visited: Set<string>,
  path: string[],
): string[] | undefined {
  // Добавляем текущую вершину в путь
  path.push(name);
  visiting.add(name);

  for (const dep of graph[name] ?? []) {
    if (visited.has(dep)) {
      continue;
    }
    if (visiting.has(dep)) {
      // Нашли цикл - возвращаем путь от dep до текущей вершины
      const cycleStart = path.indexOf(dep);
      return [...path.slice(cycleStart), dep];
    }
    const cycle = detectCycle(dep, graph, visiting, visited, path);
    if (cycle) {
      return cycle;
    }
  }

  visiting.delete(name);
  visited.add(name);
  path.pop();

  return undefined;
}

/**
 * Первый найденный цикл в графе или undefined.
 */
export function findCycle(graph: DependencyGraph): string[] | undefined {
  const visiting = new Set<string>();
  const visited = new Set<string>();

  for (const name of Object.keys(graph)) {
    if (!visited.has(name)) {
      const cycle = detectCycle(name, graph, visiting, visited, []);
      if (cycle) {
        return cycle;
      }
    }
  }
  return undefined;
}

/**
 * Проверяет граф с учётом новых зависимостей задачи.
 * @throws {CircularDependencyError} при самозависимости или цикле
 */
export function checkCircularDependencies(
  name: string,
  dependencies: string[],
  graph: DependencyGraph,
): void {
  if (dependencies.includes(name)) {
    throw new CircularDependencyError(`Task '${name}' cannot depend on itself`, [name, name]);
  }

  const cycle = findCycle({ ...graph, [name]: dependencies });
  if (cycle) {
    throw new CircularDependencyError(`Circular dependency detected: ${cycle.join(' -> ')}`, cycle);
  }
}
