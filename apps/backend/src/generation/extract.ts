const FENCE = /```([^\n`]*)\n([\s\S]*?)(?:```|$)/g;
const SCRIPT_LANGS = new Set(["yaml", "yml"]);

interface FencedBlock {
  lang: string;
  body: string;
}

function fencedBlocks(response: string): FencedBlock[] {
  const blocks: FencedBlock[] = [];
  for (const m of response.matchAll(FENCE)) {
    blocks.push({ lang: m[1].trim().toLowerCase(), body: m[2] });
  }
  return blocks;
}

/**
 * Pull the playbook out of a model response: the first yaml-tagged fence,
 * else the first fence of any kind, else the whole response. A fence with no
 * closing marker runs to the end of the response.
 */
export function extractScript(response: string): string {
  const blocks = fencedBlocks(response);
  const block =
    blocks.find((b) => SCRIPT_LANGS.has(b.lang)) ?? blocks[0] ?? null;
  return (block ? block.body : response).trim();
}
