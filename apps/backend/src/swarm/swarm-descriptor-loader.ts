import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { describeError } from "./errors.js";
import { HttpToolAgent, raciRoleSchema } from "./http-tool-agent.js";
import type { SwarmRouter } from "./swarm-router.js";
import type { SwarmDefinition } from "./types.js";

const agentDescriptorSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  role: raciRoleSchema,
  endpoint: Type.String({ minLength: 1 }),
  capabilities: Type.Optional(Type.Array(Type.String())),
  description: Type.Optional(Type.String()),
  headers: Type.Optional(Type.Record(Type.String(), Type.String()))
});

const swarmDescriptorSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  members: Type.Array(Type.String({ minLength: 1 }), { minItems: 2 }),
  capabilities: Type.Optional(Type.Array(Type.String())),
  description: Type.Optional(Type.String()),
  createdBy: Type.Optional(Type.String())
});

export const swarmDescriptorFileSchema = Type.Object({
  agents: Type.Optional(Type.Array(agentDescriptorSchema)),
  swarms: Type.Optional(Type.Array(swarmDescriptorSchema))
});

export type AgentDescriptor = Static<typeof agentDescriptorSchema>;
export type SwarmDescriptorFile = Static<typeof swarmDescriptorFileSchema>;

export interface LoadedDescriptors {
  agents: AgentDescriptor[];
  swarms: SwarmDefinition[];
  warnings: string[];
}

export interface AppliedDescriptors {
  agents: string[];
  swarms: string[];
  warnings: string[];
}

/** Reads every `*.json` descriptor file in the directory, in file name order. */
export async function loadSwarmDescriptors(directory: string): Promise<LoadedDescriptors> {
  const loaded: LoadedDescriptors = { agents: [], swarms: [], warnings: [] };

  let fileNames: string[];
  try {
    fileNames = (await readdir(directory)).filter((fileName) => fileName.endsWith(".json")).sort();
  } catch (error) {
    if (isEnoentError(error)) {
      return loaded;
    }
    throw error;
  }

  for (const fileName of fileNames) {
    const path = join(directory, fileName);
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(path, "utf8"));
    } catch (error) {
      loaded.warnings.push(`${fileName}: unreadable descriptor (${describeError(error)})`);
      continue;
    }

    if (!Value.Check(swarmDescriptorFileSchema, parsed)) {
      const firstError = Value.Errors(swarmDescriptorFileSchema, parsed).First();
      const detail = firstError ? `${firstError.path || "/"} ${firstError.message}` : "unexpected shape";
      loaded.warnings.push(`${fileName}: invalid descriptor (${detail})`);
      continue;
    }

    for (const agent of parsed.agents ?? []) {
      if (!isHttpUrl(agent.endpoint)) {
        loaded.warnings.push(`${fileName}: agent ${agent.id} has an invalid endpoint ${agent.endpoint}`);
        continue;
      }
      loaded.agents.push(agent);
    }

    for (const swarm of parsed.swarms ?? []) {
      loaded.swarms.push({
        name: swarm.name,
        memberIds: swarm.members,
        ...(swarm.capabilities ? { capabilities: swarm.capabilities } : {}),
        ...(swarm.description ? { description: swarm.description } : {}),
        createdBy: swarm.createdBy ?? fileName
      });
    }
  }

  return loaded;
}

/** Registers agents first so swarms can reference agents from any file. */
export function applySwarmDescriptors(router: SwarmRouter, descriptors: LoadedDescriptors): AppliedDescriptors {
  const applied: AppliedDescriptors = { agents: [], swarms: [], warnings: [...descriptors.warnings] };

  for (const descriptor of descriptors.agents) {
    try {
      router.registerAgent(
        new HttpToolAgent({
          id: descriptor.id,
          role: descriptor.role,
          endpoint: descriptor.endpoint,
          capabilities: descriptor.capabilities,
          description: descriptor.description,
          headers: descriptor.headers
        })
      );
      applied.agents.push(descriptor.id);
    } catch (error) {
      applied.warnings.push(describeError(error));
    }
  }

  for (const definition of descriptors.swarms) {
    try {
      applied.swarms.push(router.registerSwarm(definition).name);
    } catch (error) {
      applied.warnings.push(describeError(error));
    }
  }

  return applied;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

function isEnoentError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
