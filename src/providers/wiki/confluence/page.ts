/**
 * Meeting Page Builder
 *
 * Renders a meeting as Confluence storage-format HTML.
 */

export interface PageActionItem {
  description: string;
  assignee: string | null;
  deadline: string;
  ticketKey: string | null;
}

export interface MeetingPageInput {
  title: string;
  meetingDate: string;
  projectName: string | null;
  summary: string | null;
  actionItems: PageActionItem[];
  transcript: string | null;
  /** Tracker site used for ticket links ({tracker}/browse/{key}) */
  trackerBaseUrl: string | null;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function buildMeetingPage(input: MeetingPageInput): string {
  const parts: string[] = [];

  parts.push(`<h1>${escapeHtml(input.title)}</h1>`);
  parts.push(`<p><strong>Date:</strong> ${escapeHtml(input.meetingDate)}</p>`);
  if (input.projectName) {
    parts.push(`<p><strong>Project:</strong> ${escapeHtml(input.projectName)}</p>`);
  }
  parts.push('<hr/>');

  parts.push('<h2>Summary</h2>');
  parts.push(`<p>${escapeHtml(input.summary ?? 'No summary available.')}</p>`);

  parts.push('<h2>Action Items</h2>');
  if (input.actionItems.length === 0) {
    parts.push('<p>No action items.</p>');
  } else {
    parts.push('<table>');
    parts.push('<tr><th>Ticket</th><th>Task</th><th>Assignee</th><th>Deadline</th></tr>');
    for (const item of input.actionItems) {
      parts.push(
        `<tr><td>${renderTicket(item.ticketKey, input.trackerBaseUrl)}</td>` +
          `<td>${escapeHtml(item.description)}</td>` +
          `<td>${escapeHtml(item.assignee ?? 'Unassigned')}</td>` +
          `<td>${escapeHtml(item.deadline)}</td></tr>`
      );
    }
    parts.push('</table>');
  }

  if (input.transcript) {
    parts.push('<h2>Transcript</h2>');
    parts.push(
      '<ac:structured-macro ac:name="expand">' +
        '<ac:parameter ac:name="title">Full transcript</ac:parameter>' +
        '<ac:rich-text-body>'
    );
    for (const paragraph of input.transcript.split(/\n{2,}/)) {
      if (paragraph.trim()) parts.push(`<p>${escapeHtml(paragraph.trim())}</p>`);
    }
    parts.push('</ac:rich-text-body></ac:structured-macro>');
  }

  return parts.join('\n');
}

function renderTicket(key: string | null, trackerBaseUrl: string | null): string {
  if (!key) return '-';
  if (!trackerBaseUrl) return escapeHtml(key);
  const href = `${trackerBaseUrl.replace(/\/+$/, '')}/browse/${encodeURIComponent(key)}`;
  return `<a href="${escapeHtml(href)}">${escapeHtml(key)}</a>`;
}
