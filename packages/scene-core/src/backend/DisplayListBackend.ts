import { Affine } from "@vecscene/geometry";
import type { RGBA } from "../color.js";
import type { DisplayList, DrawCommand } from "./drawCommands.js";
import type {
  FillPrimitive,
  GlyphRun,
  LayerBracket,
  SceneBackend,
  StrokePrimitive
} from "./types.js";

function transformCommand(command: DrawCommand, transform: Affine): DrawCommand {
  switch (command.kind) {
    case "fill":
    case "stroke":
    case "glyphs":
      return { ...command, transform: Affine.compose(transform, command.transform) };
    case "pushLayer":
      return { ...command, clipTransform: Affine.compose(transform, command.clipTransform) };
    case "popLayer":
      return command;
  }
}

/**
 * Default backend: records lowered primitives into a plain display list that
 * renderers replay.
 */
export class DisplayListBackend implements SceneBackend<DisplayList> {
  private commands: DrawCommand[] = [];

  fill(primitive: FillPrimitive): void {
    this.commands.push({ kind: "fill", ...primitive });
  }

  stroke(primitive: StrokePrimitive): void {
    this.commands.push({ kind: "stroke", ...primitive });
  }

  pushLayer(layer: LayerBracket): void {
    this.commands.push({ kind: "pushLayer", ...layer });
  }

  popLayer(): void {
    this.commands.push({ kind: "popLayer" });
  }

  drawGlyphs(run: GlyphRun): void {
    this.commands.push({ kind: "glyphs", ...run });
  }

  /** Inlines the frame's commands with `transform` applied on top of their own. */
  append(frame: DisplayList, transform: Affine): void {
    for (const command of frame.commands) {
      this.commands.push(Affine.isIdentity(transform) ? command : transformCommand(command, transform));
    }
  }

  finish(background?: RGBA): DisplayList {
    const commands = this.commands;
    this.commands = [];
    return background ? { commands, background } : { commands };
  }
}
