import path from "path";
import { promises as fs } from "fs";
import { ConfigurationError, errorMessage } from "../errors";
import { findUp } from "../utils/fs";

export interface PageTemplates {
  page: string;
  fieldsTable: string;
  viewsTable: string;
}

const TEMPLATE_FILES: Record<keyof PageTemplates, string> = {
  page: "object-page.html",
  fieldsTable: "fields-table.html",
  viewsTable: "views-table.html"
};

export function defaultTemplatesDir(): string {
  return findUp("templates");
}

async function readTemplate(templatesDir: string, fileName: string): Promise<string> {
  const filePath = path.join(templatesDir, fileName);
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read page template ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
}

export async function loadPageTemplates(templatesDir: string = defaultTemplatesDir()): Promise<PageTemplates> {
  const [page, fieldsTable, viewsTable] = await Promise.all([
    readTemplate(templatesDir, TEMPLATE_FILES.page),
    readTemplate(templatesDir, TEMPLATE_FILES.fieldsTable),
    readTemplate(templatesDir, TEMPLATE_FILES.viewsTable)
  ]);
  return { page, fieldsTable, viewsTable };
}
