import { z } from "zod";
import { StructuralTreeError } from "../utils/errors.js";

export const XML_DECLARATION = "<?xml version='1.0' encoding='utf-8'?>";

const INDENT = "  ";

export type MarkupAttributes = Readonly<Record<string, string>>;

export interface MarkupElement {
  kind: "element";
  tag: string;
  attributes?: MarkupAttributes;
  children: readonly MarkupNode[];
}

export interface MarkupText {
  kind: "text";
  tag: string;
  attributes?: MarkupAttributes;
  text: string;
}

export type MarkupNode = MarkupElement | MarkupText;

export function element(
  tag: string,
  children: readonly MarkupNode[] = [],
  attributes?: MarkupAttributes,
): MarkupElement {
  return attributes ? { kind: "element", tag, attributes, children } : { kind: "element", tag, children };
}

export function textNode(tag: string, text: string, attributes?: MarkupAttributes): MarkupText {
  return attributes ? { kind: "text", tag, attributes, text } : { kind: "text", tag, text };
}

function openTag(node: MarkupNode): string {
  const attributes = Object.entries(node.attributes ?? {});
  if (attributes.length === 0) {
    return `<${node.tag}>`;
  }
  const formatted = attributes.map(([name, value]) => `${name}="${value}"`).join(" ");
  return `<${node.tag} ${formatted}>`;
}

/**
 * Renders one node and its subtree. `prefix` is the indentation already
 * written before the opening tag; children are placed one step deeper.
 */
export function renderNode(node: MarkupNode, prefix = ""): string {
  if (node.tag.length === 0) {
    throw new StructuralTreeError(node.tag, "tag must not be empty");
  }

  const open = openTag(node);
  const close = `</${node.tag}>\n`;

  if (node.kind === "text") {
    return `${open}${node.text}${close}`;
  }

  if (node.children.length === 0) {
    return `${open}${close}`;
  }

  const childPrefix = prefix + INDENT;
  const body = node.children.map((child) => childPrefix + renderNode(child, childPrefix)).join("");
  return `${open}\n${body}${prefix}${close}`;
}

export function render(root: MarkupNode): string {
  return `${XML_DECLARATION}\n${renderNode(root)}`;
}

// JSON-intermediate form: what a tree looks like once it has been through
// JSON.stringify/parse, with no `kind` discriminant.
interface RawMarkupNode {
  tag: string;
  text?: string;
  attributes?: Record<string, string>;
  children?: RawMarkupNode[];
}

const rawMarkupNodeSchema: z.ZodType<RawMarkupNode> = z.lazy(() =>
  z.object({
    tag: z.string(),
    text: z.string().optional(),
    attributes: z.record(z.string()).optional(),
    children: z.array(rawMarkupNodeSchema).optional(),
  }),
);

function fromRaw(raw: RawMarkupNode): MarkupNode {
  if (raw.text !== undefined && raw.children !== undefined) {
    throw new StructuralTreeError(raw.tag, "node has both text and children");
  }
  const attributes = raw.attributes && Object.keys(raw.attributes).length > 0 ? raw.attributes : undefined;
  if (raw.text !== undefined) {
    return textNode(raw.tag, raw.text, attributes);
  }
  return element(raw.tag, (raw.children ?? []).map(fromRaw), attributes);
}

export function toMarkupNode(value: unknown): MarkupNode {
  const parsed = rawMarkupNodeSchema.safeParse(value);
  if (!parsed.success) {
    const tag =
      typeof value === "object" && value !== null && "tag" in value && typeof value.tag === "string"
        ? value.tag
        : "?";
    throw new StructuralTreeError(tag, parsed.error.issues.map((issue) => issue.message).join("; "));
  }
  return fromRaw(parsed.data);
}
