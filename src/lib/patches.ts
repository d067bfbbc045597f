/**
 * Source fixes applied in a package's prepare() step.
 *
 * Patterns are sed basic regular expressions. Only packages listed in
 * SOURCE_PATCHES get a patch stage; adding an entry is the way to patch
 * another driver.
 */

interface PatchBase {
  file: string;
  /** grep pattern written to modifications.log after patching. */
  verify: string;
  /** Lines of context for the verification grep. */
  context?: number;
}

export type SourcePatch =
  | (PatchBase & { kind: "substitute"; find: string; replace: string; global?: boolean })
  | (PatchBase & { kind: "insert-after"; anchor: string; line: string })
  | (PatchBase & { kind: "comment-out-block"; start: string });

const MODIFICATIONS_LOG = '"$srcdir/modifications.log"';

export const SOURCE_PATCHES: Readonly<Record<string, readonly SourcePatch[]>> = {
  "xlibre-video-intel": [
    // symbol collides with the server's own __container_of
    {
      kind: "substitute",
      file: "src/intel_list.h",
      find: "__container_of",
      replace: "__intel_container_of",
      global: true,
      verify: "__intel_container_of",
    },
    // already defined by the server headers
    {
      kind: "substitute",
      file: "src/sna/sna_video.h",
      find: "#define FOURCC_RGB565",
      replace: "//#define FOURCC_RGB565",
      verify: "FOURCC_RGB565",
    },
    {
      kind: "insert-after",
      file: "src/sna/sna_accel.c",
      anchor: '#include "sna.h"',
      line: "#include <xorg/server.h>",
      verify: "server.h",
    },
    {
      kind: "comment-out-block",
      file: "src/sna/sna_accel.c",
      start: "^static void *sna_poly_fill_rect_stippled_nxm_blt(",
      verify: "sna_poly_fill_rect_stippled_nxm_blt",
      context: 5,
    },
    {
      kind: "comment-out-block",
      file: "src/sna/sna_accel.c",
      start: "^static void *sna_poly_fill_rect_stippled_n_box__imm(",
      verify: "sna_poly_fill_rect_stippled_n_box__imm",
      context: 5,
    },
  ],
};

function escapeSlashes(text: string): string {
  return text.replace(/\//g, "\\/");
}

function escapeReplacement(text: string): string {
  return text.replace(/[\\/&]/g, "\\$&");
}

function assertQuotable(text: string): void {
  if (text.includes("'")) {
    throw new Error(`Patch text cannot contain a single quote: ${text}`);
  }
}

export function renderPatch(patch: SourcePatch): string {
  switch (patch.kind) {
    case "substitute": {
      assertQuotable(patch.find);
      assertQuotable(patch.replace);
      const flags = patch.global ? "g" : "";
      return `sed -i 's/${escapeSlashes(patch.find)}/${escapeReplacement(patch.replace)}/${flags}' ${patch.file}`;
    }
    case "insert-after":
      assertQuotable(patch.anchor);
      assertQuotable(patch.line);
      return `sed -i '/${escapeSlashes(patch.anchor)}/a ${escapeSlashes(patch.line)}' ${patch.file}`;
    case "comment-out-block":
      assertQuotable(patch.start);
      return `sed -i '/${escapeSlashes(patch.start)}/,/^}/ s/^/\\/\\/ /' ${patch.file}`;
  }
}

function renderVerification(patch: SourcePatch): string {
  const context = patch.context ? `-C ${patch.context} ` : "";
  return (
    `grep -H ${context}"${patch.verify}" ${patch.file} >> ${MODIFICATIONS_LOG}` +
    ` || echo "No ${patch.verify} found" >> ${MODIFICATIONS_LOG}`
  );
}

/** prepare() body lines for a package, or undefined when it has no patches. */
export function renderPatchStage(id: string): string[] | undefined {
  const patches = SOURCE_PATCHES[id];
  if (!patches || patches.length === 0) return undefined;

  return [
    ...patches.map(renderPatch),
    `echo "Modified files for ${id}:" >> ${MODIFICATIONS_LOG}`,
    ...patches.map(renderVerification),
  ];
}
