import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import {
  contentDigest,
  isEmptyBounds,
  readConfigFromYaml,
  type Diagnostic,
  type EditorConfig,
  type Vec3
} from "@voxedit/core";
import { EditorSession, type Layer } from "@voxedit/document";
import { deserializeMesh, serializeMesh } from "@voxedit/mesh";
import { ProceduralProgram } from "@voxedit/procedural";
import { meshCacheKey, RENDERER_VERSION, renderThumbnailPng, thumbCacheKey } from "@voxedit/renderer";

export interface RunOptions {
  programPath: string;
  configPath?: string;
  /** Applied over the config file. */
  overrides?: Partial<EditorConfig>;
  /** Mesh snapshot loaded as a base layer; the program is placed on its bounds. */
  basePath?: string;
  thumbPath?: string;
  thumbSize?: number;
  snapshotPath?: string;
}

export interface RunSummary {
  program: string;
  steps: number;
  frames: number;
  layers: number;
  blocks: number;
  voxels: number;
  bounds: { min: Vec3; max: Vec3 } | null;
  key: number;
  digest: string;
  warnings: Diagnostic[];
  thumbnail?: { path: string; cacheKey: string };
  snapshot?: string;
}

export function formatDiagnostic(d: Diagnostic): string {
  return `${d.code} ${d.message}${d.line !== undefined ? ` (line ${d.line})` : ""}`;
}

function writeFileEnsuringDir(path: string, data: string | Buffer): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, data);
}

function loadBaseLayer(session: EditorSession, path: string): Layer {
  const base = session.image.activeLayer;
  base.name = "Base";
  const loaded = deserializeMesh(JSON.parse(readFileSync(path, "utf8")), session.pool);
  try {
    session.edit((mesh) => mesh.adopt(loaded));
  } catch (error) {
    loaded.release();
    throw error;
  }
  session.image.addLayer("Program");
  return base;
}

/**
 * Runs a procedural program into a fresh document and describes the layer
 * it built. With a base layer the program restarts whenever the base changes.
 */
export function runProgram(options: RunOptions): RunSummary {
  const config = {
    ...(options.configPath ? readConfigFromYaml(options.configPath) : {}),
    ...options.overrides
  };
  const program = new ProceduralProgram();
  if (!program.parse(readFileSync(options.programPath, "utf8"))) {
    throw new Error(`Program has errors: ${program.errors.map(formatDiagnostic).join("; ")}`);
  }

  const session = new EditorSession({ config });
  try {
    const base = options.basePath ? loadBaseLayer(session, options.basePath) : null;
    session.setTool("procedural");
    session.checkTool();
    do {
      if (program.needsRerun(base ? base.mesh.key : 0)) {
        session.edit((mesh) => mesh.clear());
        program.start(base ? base.mesh.boundingBox() : undefined);
      }
      session.edit((mesh) => program.iter(mesh, session.config.stepsPerFrame));
      session.frame();
    } while (program.state === "running");
    session.commit();

    const layer = session.image.activeLayer;
    const mesh = layer.mesh;
    const voxels = [...mesh.iterateVoxels()];
    const bounds = mesh.boundingBox();
    const summary: RunSummary = {
      program: options.programPath,
      steps: program.stepCount,
      frames: program.frameCount,
      layers: session.image.layers.length,
      blocks: mesh.blockCount,
      voxels: voxels.length,
      bounds: isEmptyBounds(bounds)
        ? null
        : { min: [bounds.minX, bounds.minY, bounds.minZ], max: [bounds.maxX, bounds.maxY, bounds.maxZ] },
      key: mesh.key,
      digest: contentDigest(voxels, { layer: layer.name }),
      warnings: program.warnings
    };

    if (options.thumbPath) {
      const size = options.thumbSize ?? 256;
      const visible = session.image.visibleMesh();
      const visibleDigest = contentDigest([...visible.iterateVoxels()]);
      writeFileEnsuringDir(options.thumbPath, renderThumbnailPng(visible, { width: size, height: size }));
      summary.thumbnail = {
        path: options.thumbPath,
        cacheKey: thumbCacheKey(meshCacheKey(visibleDigest, RENDERER_VERSION, 0), `${size}x${size}`, RENDERER_VERSION)
      };
    }
    if (options.snapshotPath) {
      writeFileEnsuringDir(options.snapshotPath, `${JSON.stringify(serializeMesh(mesh))}\n`);
      summary.snapshot = options.snapshotPath;
    }
    return summary;
  } finally {
    session.dispose();
  }
}
