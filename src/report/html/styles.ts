/** Inline stylesheet; the report is a single self-contained file. */
export const REPORT_STYLES = `
* { margin: 0; padding: 0; box-sizing: border-box; }
body {
  font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif;
  background: linear-gradient(135deg, #667eea 0%, #764ba2 100%);
  padding: 20px;
  line-height: 1.6;
}
.container {
  max-width: 1400px;
  margin: 0 auto;
  background: white;
  border-radius: 15px;
  box-shadow: 0 20px 60px rgba(0,0,0,0.3);
  overflow: hidden;
}
.header {
  background: linear-gradient(135deg, #2d3748 0%, #1a202c 100%);
  color: white;
  padding: 40px;
  text-align: center;
}
.header h1 { font-size: 2.5em; margin-bottom: 10px; }
.header .subtitle { font-size: 1.1em; opacity: 0.9; margin-top: 10px; }
.meta-info { background: #f7fafc; padding: 25px 40px; border-bottom: 3px solid #e2e8f0; }
.meta-info p { margin: 8px 0; color: #4a5568; font-size: 0.95em; }
.meta-info strong { color: #2d3748; font-weight: 600; }
.content { padding: 40px; }
.summary-cards {
  display: grid;
  grid-template-columns: repeat(auto-fit, minmax(250px, 1fr));
  gap: 20px;
  margin-bottom: 40px;
}
.card {
  background: linear-gradient(135deg, #667eea 0%, #764ba2 100%);
  color: white;
  padding: 25px;
  border-radius: 12px;
  box-shadow: 0 4px 15px rgba(0,0,0,0.1);
}
.card h3 { font-size: 0.9em; opacity: 0.9; margin-bottom: 10px; text-transform: uppercase; letter-spacing: 1px; }
.card .number { font-size: 3em; font-weight: bold; }
.card.success { background: linear-gradient(135deg, #48bb78 0%, #38a169 100%); }
.card.warning { background: linear-gradient(135deg, #ed8936 0%, #dd6b20 100%); }
.card.info { background: linear-gradient(135deg, #4299e1 0%, #3182ce 100%); }
.section { margin-bottom: 40px; }
.section h2 {
  color: #2d3748;
  font-size: 1.8em;
  margin-bottom: 20px;
  padding-bottom: 10px;
  border-bottom: 3px solid #667eea;
}
.table-container { overflow-x: auto; border-radius: 8px; box-shadow: 0 2px 10px rgba(0,0,0,0.08); }
table { width: 100%; border-collapse: collapse; font-size: 0.9em; }
thead { background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); color: white; }
thead th { padding: 15px; text-align: left; font-weight: 600; text-transform: uppercase; font-size: 0.85em; }
tbody tr { border-bottom: 1px solid #e2e8f0; }
tbody tr:nth-child(even) { background-color: #fafafa; }
tbody td { padding: 12px 15px; color: #4a5568; }
td.wrap { word-break: break-all; }
.badge { display: inline-block; padding: 4px 12px; border-radius: 20px; font-size: 0.85em; font-weight: 600; }
.badge.success { background: #c6f6d5; color: #22543d; }
.badge.warning { background: #feebc8; color: #7b341e; }
.badge.error { background: #fed7d7; color: #742a2a; }
.note { margin-top: 20px; padding: 15px; background: #fff3cd; border-left: 4px solid #ffc107; border-radius: 4px; }
.note p { margin: 10px 0 0 0; color: #856404; }
.code-block {
  background: #2d3748;
  color: #e2e8f0;
  padding: 20px;
  border-radius: 8px;
  font-family: 'Courier New', monospace;
  font-size: 0.9em;
  white-space: pre-wrap;
  word-wrap: break-word;
}
.pagination-info { margin-top: 20px; padding: 15px; background: #edf2f7; border-radius: 8px; text-align: center; color: #4a5568; }
.footer { background: #f7fafc; padding: 30px; text-align: center; color: #718096; border-top: 3px solid #e2e8f0; }
.footer p { margin: 5px 0; }
@media print {
  body { background: white; padding: 0; }
  .container { box-shadow: none; }
  .card { break-inside: avoid; }
}
`;
