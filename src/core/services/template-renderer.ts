/**
 * Template Renderer
 * Fills `{field}` placeholders with recipient values. `{{` and `}}` are literal braces.
 */

import { TemplateError } from "../errors"
import type { Recipient } from "../types"

type Segment = { type: "text"; value: string } | { type: "field"; name: string }

const FIELD_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/

export const BUILTIN_FIELDS = ["name", "phone_number"] as const

export class TemplateRenderer {
  render(template: string, recipient: Recipient): string {
    let out = ""
    for (const segment of parseTemplate(template)) {
      out += segment.type === "text" ? segment.value : resolveField(recipient, segment.name)
    }
    return out
  }

  /**
   * Distinct field names referenced by a template, in order of first use
   */
  placeholders(template: string): string[] {
    const names = new Set<string>()
    for (const segment of parseTemplate(template)) {
      if (segment.type === "field") names.add(segment.name)
    }
    return [...names]
  }
}

function resolveField(recipient: Recipient, name: string): string {
  if (name === "name") return recipient.name
  if (name === "phone_number") return recipient.phoneNumber
  if (Object.prototype.hasOwnProperty.call(recipient.fields, name)) {
    return recipient.fields[name]
  }
  throw new TemplateError(`unknown placeholder {${name}} for ${recipient.phoneNumber}`, name)
}

function parseTemplate(template: string): Segment[] {
  const segments: Segment[] = []
  let text = ""
  let i = 0

  while (i < template.length) {
    const ch = template[i]

    if (ch === "{") {
      if (template[i + 1] === "{") {
        text += "{"
        i += 2
        continue
      }
      const close = template.indexOf("}", i + 1)
      if (close === -1) {
        throw new TemplateError(`unclosed placeholder at position ${i}`)
      }
      const name = template.slice(i + 1, close)
      if (!FIELD_NAME_PATTERN.test(name)) {
        throw new TemplateError(`invalid placeholder {${name}} at position ${i}`)
      }
      if (text) {
        segments.push({ type: "text", value: text })
        text = ""
      }
      segments.push({ type: "field", name })
      i = close + 1
      continue
    }

    if (ch === "}") {
      if (template[i + 1] === "}") {
        text += "}"
        i += 2
        continue
      }
      throw new TemplateError(`unmatched '}' at position ${i}`)
    }

    text += ch
    i += 1
  }

  if (text) segments.push({ type: "text", value: text })
  return segments
}
