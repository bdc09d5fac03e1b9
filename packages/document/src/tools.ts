export const TOOL_REQUIRE_CAN_EDIT = 1 << 0;
export const TOOL_REQUIRE_CAN_MOVE = 1 << 1;
export const TOOL_ALLOW_PICK_COLOR = 1 << 2;

export interface ToolDescriptor {
  id: string;
  actionId: string;
  flags: number;
  defaultShortcut?: string;
}

export const DEFAULT_TOOLS: readonly ToolDescriptor[] = [
  { id: "brush", actionId: "tool_set_brush", flags: TOOL_REQUIRE_CAN_EDIT | TOOL_ALLOW_PICK_COLOR, defaultShortcut: "B" },
  { id: "shape", actionId: "tool_set_shape", flags: TOOL_REQUIRE_CAN_EDIT | TOOL_ALLOW_PICK_COLOR, defaultShortcut: "S" },
  { id: "laser", actionId: "tool_set_laser", flags: TOOL_REQUIRE_CAN_EDIT, defaultShortcut: "L" },
  { id: "set_plane", actionId: "tool_set_plane", flags: 0, defaultShortcut: "P" },
  { id: "move", actionId: "tool_set_move", flags: TOOL_REQUIRE_CAN_MOVE, defaultShortcut: "M" },
  { id: "pick_color", actionId: "tool_set_pick_color", flags: 0, defaultShortcut: "C" },
  { id: "selection", actionId: "tool_set_selection", flags: 0, defaultShortcut: "R" },
  { id: "procedural", actionId: "tool_set_procedural", flags: TOOL_REQUIRE_CAN_EDIT },
  { id: "extrude", actionId: "tool_set_extrude", flags: TOOL_REQUIRE_CAN_EDIT, defaultShortcut: "E" }
];

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDescriptor>();

  public constructor(descriptors: readonly ToolDescriptor[] = DEFAULT_TOOLS) {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  public register(descriptor: ToolDescriptor): void {
    if (this.tools.has(descriptor.id)) {
      throw new Error(`Tool already registered: ${descriptor.id}`);
    }
    this.tools.set(descriptor.id, { ...descriptor });
  }

  public get(id: string): ToolDescriptor | undefined {
    return this.tools.get(id);
  }

  public list(): ToolDescriptor[] {
    return [...this.tools.values()];
  }

  public byShortcut(shortcut: string): ToolDescriptor | undefined {
    return this.list().find((tool) => tool.defaultShortcut === shortcut);
  }
}
