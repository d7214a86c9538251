// src/llm/role-registry.ts — Named roles bound to an invoker
// Roles are created once per registry and handed to components explicitly.

import {
  ROLE_DEFINITIONS,
  ROLE_NAMES,
  type RoleDefinition,
  type RoleName,
} from "../templates/roles.js";
import type { InvocationResult, RoleInvoker } from "./client.js";

export interface RoleOptions {
  maxOutputTokens: number;
  /** Overrides each role's own temperature when set. */
  temperature?: number;
}

export class Role {
  private disposed = false;

  constructor(
    readonly definition: RoleDefinition,
    private readonly invoker: RoleInvoker,
    private readonly options: RoleOptions,
  ) {}

  get name(): RoleName {
    return this.definition.name;
  }

  get temperature(): number {
    return this.options.temperature ?? this.definition.temperature;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  invoke(instruction: string, payload: string, signal?: AbortSignal): Promise<InvocationResult> {
    if (this.disposed) {
      return Promise.reject(new Error(`Role "${this.name}" used after dispose`));
    }
    return this.invoker.invoke({
      role: this.name,
      system: this.definition.systemPrompt,
      instruction,
      payload,
      temperature: this.temperature,
      maxOutputTokens: this.options.maxOutputTokens,
      signal,
    });
  }

  dispose(): void {
    this.disposed = true;
  }
}

export class RoleRegistry {
  private readonly roles = new Map<RoleName, Role>();

  constructor(
    private readonly invoker: RoleInvoker,
    private readonly options: RoleOptions,
    private readonly definitions: Record<RoleName, RoleDefinition> = ROLE_DEFINITIONS,
  ) {}

  /**
   * Cached role for a name, created from its definition on first use.
   */
  getOrCreate(name: RoleName): Role {
    let role = this.roles.get(name);
    if (!role) {
      role = new Role(this.definitions[name], this.invoker, this.options);
      this.roles.set(name, role);
    }
    return role;
  }

  initialize(): Role[] {
    return ROLE_NAMES.map((name) => this.getOrCreate(name));
  }

  dispose(): void {
    for (const role of this.roles.values()) role.dispose();
    this.roles.clear();
  }

  get size(): number {
    return this.roles.size;
  }
}
