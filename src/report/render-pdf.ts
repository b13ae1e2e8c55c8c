import PDFDocument from 'pdfkit'

const MARGIN = 36

const plain = (text: string): string => text.replace(/\*\*/g, '').replace(/^_(.*)_$/, '$1')

/**
 * Lays the Markdown report out line by line: `# ` title, `## `/`### `
 * headings, `- ` bullets, `---` rules, everything else as body text.
 */
export function renderPdf(markdown: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: 'LETTER',
      margins: { top: MARGIN, bottom: MARGIN, left: MARGIN, right: MARGIN },
      info: { Title: 'Running Coach Report' },
    })

    const chunks: Buffer[] = []
    doc.on('data', (chunk: Buffer) => chunks.push(chunk))
    doc.on('end', () => resolve(Buffer.concat(chunks)))
    doc.on('error', reject)

    const width = doc.page.width - MARGIN * 2

    for (const raw of markdown.split(/\r?\n/)) {
      const line = raw.trim()

      if (!line) {
        doc.moveDown(0.5)
      } else if (line === '---') {
        const y = doc.y + 4
        doc.moveTo(MARGIN, y).lineTo(MARGIN + width, y).strokeColor('#cccccc').stroke()
        doc.moveDown(0.5)
      } else if (line.startsWith('# ')) {
        doc.font('Helvetica-Bold').fontSize(20).fillColor('#000000').text(plain(line.slice(2)), { width })
      } else if (line.startsWith('## ')) {
        doc.moveDown(0.5)
        doc.font('Helvetica-Bold').fontSize(14).text(plain(line.slice(3)), { width })
      } else if (line.startsWith('### ')) {
        doc.font('Helvetica-Bold').fontSize(12).text(plain(line.slice(4)), { width })
      } else if (line.startsWith('- ')) {
        doc.font('Helvetica').fontSize(10).text(`• ${plain(line.slice(2))}`, { width, indent: 8 })
      } else {
        doc.font('Helvetica').fontSize(10).text(plain(line), { width })
      }
    }

    doc.end()
  })
}
