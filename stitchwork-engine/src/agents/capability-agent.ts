/**
 * Capability Agent
 *
 * Default agent: asks every profile whether it applies to the node (all at
 * once, joined before continuing), then generates with the ones that do.
 * Patch profiles rewrite the node's span one after another; artifact
 * profiles each produce a file, concurrently.
 */

import { CapabilityError, EngineError, TimeoutError, abortReason } from '../errors.js';
import type { ContextBuilder } from '../context/context-builder.js';
import { fanOut } from '../executor/fan-out.js';
import type { AgentExecutor, AgentInvocation } from '../executor/types.js';
import type { AgentNode, AgentOutput, ArtifactProposal, NodeContext } from '../types/index.js';
import { cleanGeneratedText, parseRelevance, type Capabilities } from './capabilities.js';

export interface AgentProfile {
  name: string;
  intent: string;
  /** Overlay path for artifact output; defaults under .stitchwork/artifacts */
  artifactPath?: string | ((node: AgentNode) => string);
}

export interface CapabilityAgentOptions {
  capabilities: Capabilities;
  profiles: AgentProfile[];
  output: 'patch' | 'artifact';
  /** Deadline for each single capability call */
  callTimeoutMs?: number;
  /** Cap on relevance checks in flight for one node */
  relevanceConcurrency?: number;
  /** Adds a recent-activity digest to the context the capabilities see */
  memory?: ContextBuilder;
}

export function defaultArtifactPath(node: AgentNode, profile: AgentProfile): string {
  return `.stitchwork/artifacts/${encodeURIComponent(node.id)}/${encodeURIComponent(profile.name)}.md`;
}

export function createCapabilityAgent(options: CapabilityAgentOptions): AgentExecutor {
  const { capabilities, profiles, callTimeoutMs } = options;

  return async (invocation: AgentInvocation): Promise<AgentOutput> => {
    const { node, signal } = invocation;
    const context: NodeContext = options.memory
      ? { ...invocation.context, memory: options.memory.render(node.upstream) }
      : invocation.context;

    const verdicts = await fanOut(
      profiles,
      async (profile, childSignal) =>
        parseRelevance(
          await callCapability('relevance', () => capabilities.relevance(profile.intent, context, childSignal), {
            timeoutMs: callTimeoutMs,
            signal: childSignal,
          })
        ),
      { signal, concurrency: options.relevanceConcurrency }
    );

    const selected = profiles.filter((_, index) => verdicts[index]);
    if (selected.length === 0) {
      return { kind: 'noop', message: 'No profile applies to this node' };
    }

    const generate = async (profile: AgentProfile, input: NodeContext, callSignal: AbortSignal): Promise<string> => {
      try {
        const raw = await callCapability('generate', () => capabilities.generate(profile.intent, input, callSignal), {
          timeoutMs: callTimeoutMs,
          signal: callSignal,
        });
        const text = cleanGeneratedText(raw);
        invocation.run.emit(
          'agent:action',
          { action: profile.name, outcome: 'success', summary: `generated ${Buffer.byteLength(text, 'utf-8')} bytes` },
          node.id
        );
        return text;
      } catch (err) {
        invocation.run.emit(
          'agent:action',
          { action: profile.name, outcome: 'error', summary: err instanceof Error ? err.message : String(err) },
          node.id
        );
        throw err;
      }
    };

    const applied = selected.map((profile) => profile.name).join(', ');

    if (options.output === 'patch') {
      let text = context.text;
      for (const profile of selected) {
        text = await generate(profile, { ...context, text }, signal);
      }
      if (text === context.text) {
        return { kind: 'noop', message: `${applied} left the span unchanged` };
      }
      return {
        kind: 'patch',
        patches: [{ start: 0, end: Buffer.byteLength(context.text, 'utf-8'), content: text }],
        message: `Rewritten by ${applied}`,
      };
    }

    const artifacts = await fanOut(
      selected,
      async (profile, childSignal): Promise<ArtifactProposal> => ({
        path: resolveArtifactPath(node, profile),
        content: await generate(profile, context, childSignal),
      }),
      { signal }
    );
    return { kind: 'artifact', artifacts, message: `Artifacts from ${applied}` };
  };
}

function resolveArtifactPath(node: AgentNode, profile: AgentProfile): string {
  if (typeof profile.artifactPath === 'function') return profile.artifactPath(node);
  return profile.artifactPath ?? defaultArtifactPath(node, profile);
}

/**
 * Run one capability call under an optional deadline. Engine errors pass
 * through; anything else becomes a CapabilityError.
 */
async function callCapability<T>(
  capability: 'relevance' | 'generate',
  call: () => Promise<T>,
  options: { timeoutMs?: number; signal: AbortSignal }
): Promise<T> {
  const { timeoutMs, signal } = options;
  if (signal.aborted) throw abortReason(signal);

  let timer: NodeJS.Timeout | undefined;
  try {
    const work = call();
    if (timeoutMs === undefined) return await work;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new TimeoutError(`${capability} call exceeded ${timeoutMs}ms`, timeoutMs)),
        timeoutMs
      );
    });
    return await Promise.race([work, deadline]);
  } catch (err) {
    if (err instanceof EngineError) throw err;
    if (signal.aborted) throw abortReason(signal);
    throw new CapabilityError(
      capability,
      `${capability} call failed: ${err instanceof Error ? err.message : String(err)}`,
      err
    );
  } finally {
    if (timer) clearTimeout(timer);
  }
}
