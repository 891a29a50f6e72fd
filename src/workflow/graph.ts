import { END, START, StateGraph } from "@langchain/langgraph";
import {
  node_done,
  node_generate,
  node_init,
  node_post_build,
  node_pre_build,
  node_resolve_order
} from "./nodes.js";
import { BuildStateAnnotation, type BuildState } from "./state.js";

const routeAfterInit = (state: BuildState): "resolve_order" | typeof END => (state.failure ? END : "resolve_order");

const routeAfterResolve = (state: BuildState): "pre_build" | typeof END => (state.failure ? END : "pre_build");

const routeAfterPreBuild = (state: BuildState): "generate" | typeof END => (state.failure ? END : "generate");

const routeAfterGenerate = (state: BuildState): "post_build" | typeof END => (state.failure ? END : "post_build");

const routeAfterPostBuild = (state: BuildState): "done" | typeof END => (state.failure ? END : "done");

const compiled = new StateGraph(BuildStateAnnotation)
  .addNode("init", node_init)
  .addNode("resolve_order", node_resolve_order)
  .addNode("pre_build", node_pre_build)
  .addNode("generate", node_generate)
  .addNode("post_build", node_post_build)
  .addNode("done", node_done)
  .addEdge(START, "init")
  .addConditionalEdges("init", routeAfterInit)
  .addConditionalEdges("resolve_order", routeAfterResolve)
  .addConditionalEdges("pre_build", routeAfterPreBuild)
  .addConditionalEdges("generate", routeAfterGenerate)
  .addConditionalEdges("post_build", routeAfterPostBuild)
  .addEdge("done", END)
  .compile();

export const invokeBuildGraph = async (initialState: BuildState): Promise<BuildState> => {
  const result = await compiled.invoke(initialState);
  return result;
};
