import { describe, it, expect } from "vitest";
import type { StateTransition } from "../../shared/types/module.js";
import { InvalidTransitionError, ModuleRegistry, type Endpoint } from "./index.js";

const endpoint: Endpoint = { connectionId: "conn-1", closed: false, deliver: () => true };

describe("ModuleRegistry", () => {
  it("reports unknown identities as unregistered", () => {
    const registry = new ModuleRegistry();

    expect(registry.stateOf("Camera")).toBe("unregistered");
    expect(registry.has("Camera")).toBe(false);
    expect(registry.endpointOf("Camera")).toBeNull();
  });

  it("walks the full lifecycle and reports each transition", () => {
    const seen: StateTransition[] = [];
    const registry = new ModuleRegistry((t) => seen.push(t));

    registry.transition("Camera", "registering", endpoint);
    registry.transition("Camera", "active");
    expect(registry.endpointOf("Camera")).toBe(endpoint);
    registry.transition("Camera", "stopping");
    registry.transition("Camera", "terminated");

    expect(seen.map((t) => `${t.from}->${t.to}`)).toEqual([
      "unregistered->registering",
      "registering->active",
      "active->stopping",
      "stopping->terminated",
    ]);
    expect(registry.endpointOf("Camera")).toBeNull();
  });

  it("allows the direct jump to terminated only from unregistered", () => {
    const registry = new ModuleRegistry();
    registry.transition("Camera", "terminated");
    expect(registry.stateOf("Camera")).toBe("terminated");

    registry.transition("Sensor", "registering", endpoint);
    registry.transition("Sensor", "active");
    expect(() => registry.transition("Sensor", "terminated")).toThrow(InvalidTransitionError);
  });

  it("treats terminated as absorbing", () => {
    const registry = new ModuleRegistry();
    registry.transition("Camera", "terminated");

    expect(() => registry.transition("Camera", "registering", endpoint)).toThrow(
      "Module 'Camera' cannot move from terminated to registering",
    );
  });

  it("lists snapshots and filters by state", () => {
    const registry = new ModuleRegistry();
    registry.transition("Camera", "registering", endpoint);
    registry.transition("Camera", "active");
    registry.transition("Sensor", "terminated");

    expect(registry.identitiesIn("active")).toEqual(["Camera"]);
    expect(registry.identitiesIn("active", "terminated")).toEqual(["Camera", "Sensor"]);
    expect(registry.get("Camera")).toMatchObject({ identity: "Camera", state: "active", connectionId: "conn-1" });
    expect(registry.get("Sensor")).toMatchObject({ state: "terminated", connectionId: null, registeredAt: null });
  });
});
