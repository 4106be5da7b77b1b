/**
 * Contract for agents backed by a compiled LangGraph graph
 */
export abstract class GraphAgentPort<TGraph> {
  /**
   * Unique identifier for the agent
   */
  abstract readonly agentId: string;

  /**
   * The compiled graph, built on first use
   */
  protected abstract graph: TGraph | undefined;

  public abstract getGraph(): TGraph;
}
