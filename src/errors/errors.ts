/**
 * Errors raised before a run starts. Unreachable targets and negative
 * cycles are not errors; they come back in the terminal step's result.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class UnknownAlgorithmError extends ConfigurationError {
  constructor(public algoKey: string) {
    super(`Unknown algorithm "${algoKey}"`);
    this.name = "UnknownAlgorithmError";
  }
}

/**
 * Source or target missing from the graph, or sitting on a blocked node.
 */
export class UnknownNodeError extends ConfigurationError {
  constructor(
    public role: "source" | "target",
    public nodeKey: string,
    public reason: "missing" | "blocked"
  ) {
    super(
      reason === "missing"
        ? `The ${role} node "${nodeKey}" is not in the graph`
        : `The ${role} node "${nodeKey}" is blocked`
    );
    this.name = "UnknownNodeError";
  }
}

export class NegativeWeightError extends ConfigurationError {
  constructor(
    public algoKey: string,
    public edgeKey: string,
    public weight: number
  ) {
    super(`${algoKey} does not accept negative weights (edge ${edgeKey} has weight ${weight})`);
    this.name = "NegativeWeightError";
  }
}

export class GraphInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GraphInvariantError";
  }
}

export class RecorderStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RecorderStateError";
  }
}
