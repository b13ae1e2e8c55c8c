import { Injectable, Logger } from '@nestjs/common'
import type { RenderedReport, ReportFormat, ReportPayload } from './report.types'
import { renderMarkdown } from './render-markdown'
import { renderPdf } from './render-pdf'

const slug = (name: string): string =>
  name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '') || 'runner'

@Injectable()
export class ReportService {
  private readonly logger = new Logger(ReportService.name)

  async render(payload: ReportPayload, format: ReportFormat): Promise<RenderedReport> {
    const markdown = renderMarkdown(payload)
    const base = `${slug(payload.runnerName)}-report`

    if (format === 'markdown') {
      return {
        contentType: 'text/markdown; charset=utf-8',
        filename: `${base}.md`,
        body: Buffer.from(markdown, 'utf8'),
      }
    }

    const body = await renderPdf(markdown)
    this.logger.debug(`pdf report rendered: ${body.length} bytes`)
    return { contentType: 'application/pdf', filename: `${base}.pdf`, body }
  }
}
