/**
 * Handler: generate_artifact
 *
 * The rendered markdown goes to the user through `display`; the model
 * only gets an acknowledgment so the artifact never re-enters its
 * context.
 */

import { renderArtifact } from "../../../../artifacts/render.js";
import { defineCommand } from "../command.js";
import { generateArtifactArgs } from "../schemas.js";

export const ARTIFACT_ACK = "Artifact rendered and displayed to user.";

export const generateArtifact = defineCommand("generate_artifact", generateArtifactArgs, (ctx, input) => {
  const facts = ctx.state.facts;
  const result = renderArtifact(input.artifact_type, facts.skeletonValue, facts.query());
  if (!result.ok) return { content: result.warning, applied: false };

  const artifact = { type: result.type, markdown: result.markdown, turn: ctx.turn };
  ctx.artifact = artifact;
  ctx.state.latestArtifact = artifact;
  return { content: ARTIFACT_ACK, display: result.markdown };
});
