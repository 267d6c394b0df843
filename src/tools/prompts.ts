import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { GetPromptResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

export function romantasyConceptsPrompt(tropes: string, count: number): string {
  return `Generate ${count} high-concept romantasy story ideas that incorporate these tropes: ${tropes}

For each concept, provide:
1. A compelling title
2. A one-line high concept hook
3. A 2-3 sentence synopsis
4. Key story elements (3-5 bullet points)

Make each concept unique and compelling with strong romantic and fantasy elements. Focus on fresh takes and unexpected combinations of the tropes.`;
}

export function characterProfilePrompt(characterRole: string, storyContext: string): string {
  return `Develop a detailed character profile for a ${characterRole} in this story context:

${storyContext}

Include:
1. Name and physical appearance
2. Personality traits and quirks
3. Backstory and formative experiences
4. Goals and motivations
5. Internal conflicts and fears
6. Character arc (how they change)
7. Relationships with other characters
8. Unique voice or mannerisms

Make the character complex, flawed, and compelling.`;
}

export function plotStructurePrompt(premise: string): string {
  return `Expand this story premise into a detailed three-act plot structure:

${premise}

Provide:

**ACT 1 - SETUP**
- Opening scene/hook
- Inciting incident
- First major turning point

**ACT 2 - CONFRONTATION**
- Rising complications (3-5 major plot points)
- Midpoint twist
- Low point/crisis

**ACT 3 - RESOLUTION**
- Climax
- Resolution
- Ending

Also include:
- 2-3 subplots that weave through the main plot
- Key character development moments
- Pacing notes`;
}

export function registerPrompts(server: McpServer) {
  server.registerPrompt(
    "generate_romantasy_concepts",
    {
      title: "Generate Romantasy Concepts",
      description: "Asks for a batch of romantasy concepts built on the given tropes.",
      argsSchema: {
        tropes: z.string().describe("Comma-separated tropes to include"),
        count: z.string().optional().describe("Number of concepts (default 10)"),
      },
    },
    ({ tropes, count }) => userPrompt(romantasyConceptsPrompt(tropes, parseCount(count))),
  );

  server.registerPrompt(
    "develop_character_profile",
    {
      title: "Develop Character Profile",
      description: "Asks for a detailed profile of one character.",
      argsSchema: {
        character_role: z.string().describe("e.g. protagonist, love interest, antagonist"),
        story_context: z.string().describe("Brief story context"),
      },
    },
    ({ character_role, story_context }) =>
      userPrompt(characterProfilePrompt(character_role, story_context)),
  );

  server.registerPrompt(
    "expand_plot_structure",
    {
      title: "Expand Plot Structure",
      description: "Asks for a three-act plot built from a premise.",
      argsSchema: {
        premise: z.string().describe("Story premise or high concept"),
      },
    },
    ({ premise }) => userPrompt(plotStructurePrompt(premise)),
  );
}

function userPrompt(text: string): GetPromptResult {
  return { messages: [{ role: "user", content: { type: "text", text } }] };
}

function parseCount(count: string | undefined): number {
  const parsed = Number.parseInt(count ?? "", 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : 10;
}
