/**
 * Default Markdown document template
 * Rendered with { title, date, content }
 */
export function getDefaultDocumentTemplate(): string {
  return `---
title: "{{title}}"
date: {{date}}
---

# {{title}}

{{content}}
`;
}
