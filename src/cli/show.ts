import { renderComposition } from "../model/render.js";

import { loadCompositionForCli } from "./composition-input.js";

export async function showCommand(opts: { file: string }): Promise<void> {
  const composition = await loadCompositionForCli(opts.file);
  console.log(renderComposition(composition));
}
