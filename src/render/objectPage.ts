import { OBJECT_ROLES, type ObjectField, type ObjectViews } from "../schema/objectSchema";
import type { DiagramArtifact } from "../types/diagramArtifact";
import type { ObjectDescriptor } from "../types/objectDescriptor";
import type { RenderedPage } from "../types/renderedPage";
import { sha256 } from "../utils/hash";
import { escapeXml, titleCase } from "../utils/text";
import { formatLastUpdated } from "../utils/time";
import { populateTemplate } from "./template";
import type { PageTemplates } from "./templates";

export const SYNC_ANCHOR_PREFIX = "objects-sync-";

export interface RenderOptions {
  now?: Date;
}

export function attachmentNameFor(objectId: string, format: string): string {
  return `${objectId}-diagram.${format}`;
}

function renderFieldRows(fields: ObjectField[]): string {
  return fields
    .map((field) => {
      const cells = [
        `<code>${escapeXml(field.name)}</code>`,
        escapeXml(field.type),
        field.required ? "Yes" : "No",
        escapeXml(field.description ?? "")
      ];
      return `    <tr>${cells.map((cell) => `<td>${cell}</td>`).join("")}</tr>`;
    })
    .join("\n");
}

function renderLink(url: string | null | undefined): string {
  if (!url) return "Undefined";
  return `<a href="${escapeXml(url)}">Open</a>`;
}

function renderViewRows(views: ObjectViews): string {
  const rows: string[] = [];
  for (const platform of Object.keys(views).sort()) {
    const platformViews = views[platform];
    for (const view of Object.keys(platformViews).sort()) {
      const links = platformViews[view];
      const label = `${titleCase(platform)} / ${titleCase(view)}`;
      const cells = [escapeXml(label), ...OBJECT_ROLES.map((role) => renderLink(links[role]))];
      rows.push(`    <tr>${cells.map((cell) => `<td>${cell}</td>`).join("")}</tr>`);
    }
  }
  return rows.join("\n");
}

function renderSection(template: string, rows: string, label: string, emptyText: string): string {
  if (!rows) return `<p>${emptyText}</p>`;
  return populateTemplate(template, { rows }, label);
}

/**
 * Renders the documentation page body for one object. Pure: the same
 * descriptor, artifact and templates produce the same fingerprint on every run.
 */
export function renderObjectPage(
  descriptor: ObjectDescriptor,
  artifact: DiagramArtifact,
  templates: PageTemplates,
  options: RenderOptions = {}
): RenderedPage {
  const schema = descriptor.schema;
  const attachmentName = attachmentNameFor(descriptor.id, artifact.format);

  const fieldsTable = renderSection(
    templates.fieldsTable,
    renderFieldRows(schema.fields ?? []),
    "fields table template",
    "No fields declared."
  );
  const viewsTable = renderSection(
    templates.viewsTable,
    renderViewRows(schema.views ?? {}),
    "views table template",
    "No views declared."
  );

  const values = {
    "object-id": escapeXml(descriptor.id),
    description: schema.description ? escapeXml(schema.description) : null,
    owner: schema.owner ? escapeXml(schema.owner) : null,
    "schema-file": escapeXml(descriptor.sourceFile),
    "diagram-filename": escapeXml(attachmentName),
    "design-link": escapeXml(artifact.sourceUrl),
    "fields-table": fieldsTable,
    "views-table": viewsTable
  };

  const core = populateTemplate(templates.page, { ...values, "sync-anchor": "", "last-updated": "" }, "page template");
  // The title is sent beside the body, so it is fingerprinted with it.
  const fingerprint = sha256(`${descriptor.title}\n${core}\n${artifact.fingerprint}`);

  const body = populateTemplate(
    templates.page,
    {
      ...values,
      "sync-anchor": `${SYNC_ANCHOR_PREFIX}${fingerprint}`,
      "last-updated": formatLastUpdated(options.now ?? new Date())
    },
    "page template"
  );

  return { title: descriptor.title, body, fingerprint, attachmentName };
}
