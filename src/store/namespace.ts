export interface NamespaceParts {
  provider: string;
  model: string;
  dim: number;
}

export function generateNamespace(provider: string, model: string, dim: number): string {
  return `${provider}:${model}:${dim}`;
}

/**
 * Provider is everything before the first ":" and dim everything after the
 * last one, so model names may carry their own ":" (e.g. Ollama tags).
 */
export function parseNamespace(namespace: string): NamespaceParts {
  const first = namespace.indexOf(':');
  const last = namespace.lastIndexOf(':');
  if (first <= 0 || last === first || last === namespace.length - 1 || last - first < 2) {
    throw new Error(`invalid namespace "${namespace}": expected provider:model:dim`);
  }

  const provider = namespace.slice(0, first);
  const model = namespace.slice(first + 1, last);
  const dimText = namespace.slice(last + 1);
  if (!/^\d+$/.test(dimText)) {
    throw new Error(`invalid namespace "${namespace}": dim must be a non-negative integer`);
  }

  return { provider, model, dim: Number(dimText) };
}

/** Remote collection name for a namespace: every ":" becomes "_". */
export function collectionName(namespace: string): string {
  return namespace.replaceAll(':', '_');
}

export function globalConfigCollectionName(namespace: string): string {
  return `${collectionName(namespace)}_global_configs`;
}

export function groupCollectionName(namespace: string): string {
  return `${collectionName(namespace)}_groups`;
}
