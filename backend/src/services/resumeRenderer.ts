// backend/src/services/resumeRenderer.ts

import type { Resume } from "../storage/types";

export type ResumeOwner = {
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
};

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function listItems<T>(items: T[], render: (item: T) => string): string {
  return items.map((item) => `<li>${render(item)}</li>`).join("");
}

/**
 * Standalone HTML page for a resume. The frontend prints it to PDF.
 */
export function renderResumeHtml(owner: ResumeOwner, resume: Resume): string {
  const e = escapeHtml;
  const name = `${e(owner.firstName)} ${e(owner.lastName)}`.trim();

  const lines = [
    "<html>",
    "<head><meta charset='utf-8'><title>Resume</title></head>",
    "<body style='font-family: Arial, sans-serif; padding: 24px;'>",
    `<h1 style='margin:0'>${name}</h1>`,
    `<p style='color:#555;margin:4px 0'>${e(owner.email)} • ${e(owner.phone)}</p>`,
    "<h2>Summary</h2>",
    `<p>${e(resume.summary)}</p>`,
    "<h2>Skills</h2>",
    `<p>${e(resume.skills.join(", "))}</p>`,
    "<h2>Education</h2>",
    `<ul>${listItems(
      resume.education,
      (ed) => `<strong>${e(ed.degree)}</strong> - ${e(ed.institution)} (${e(ed.year)})`
    )}</ul>`,
    "<h2>Experience</h2>",
    `<ul>${listItems(
      resume.experience,
      (ex) => `<strong>${e(ex.role)}</strong> - ${e(ex.company)} (${e(ex.duration)})<br/>${e(ex.details)}`
    )}</ul>`,
    "<h2>Projects</h2>",
    `<ul>${listItems(resume.projects, (p) => `<strong>${e(p.name)}</strong>: ${e(p.description)}`)}</ul>`,
    "</body>",
    "</html>",
  ];

  return lines.join("\n");
}
