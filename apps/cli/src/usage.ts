export const USAGE = `Usage: pdf-tools <command> [options]

PDF text extraction and batch renaming tools

Commands:
  extract   Extract text from a PDF
  rename    Batch rename PDFs using text patterns

Examples:
  # Extract text from first page
  pdf-tools extract --pdf invoice.pdf

  # Extract from first 3 pages
  pdf-tools extract --pdf report.pdf --pages 3

  # Dry-run rename (preview changes)
  pdf-tools rename \\
    --folder ./invoices \\
    --pattern "Invoice #(\\d+)" \\
    --template "INV_{1}.pdf"

  # Apply rename with named groups
  pdf-tools rename \\
    --folder ./docs \\
    --pattern "Order ID: (?P<order>\\w+)" \\
    --template "ORDER_{order}.pdf" \\
    --apply

  # Extract invoice number and date
  pdf-tools rename \\
    --folder ./bills \\
    --pattern "Invoice: (?P<num>\\d+).*Date: (?P<date>\\d{4}-\\d{2}-\\d{2})" \\
    --template "{date}_INV_{num}.pdf" \\
    --pages 2 \\
    --apply

Environment:
  PDF_TOOLS_LOG_LEVEL   debug | info | warn | error (default: info)`;

export const EXTRACT_USAGE = `Usage: pdf-tools extract --pdf <path> [--pages N]

Options:
  --pdf <path>    PDF file path
  --pages <N>     Number of pages to extract (default: 1)
  -h, --help      Show this help`;

export const RENAME_USAGE = `Usage: pdf-tools rename --folder <path> --pattern <regex> --template <string> [--pages N] [--apply]

Options:
  --folder <path>       Folder containing PDFs
  --pattern <regex>     Regex pattern (e.g. 'Invoice #(\\d+)' or 'ID: (?P<id>\\w+)')
  --template <string>   New filename template (e.g. 'INVOICE_{1}.pdf' or 'DOC_{id}.pdf')
  --pages <N>           Pages to scan per PDF (default: 1)
  --apply               Apply changes (without this flag, runs in dry-run mode)
  -h, --help            Show this help`;
