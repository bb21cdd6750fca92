export function saveBlob(name: string, blob: Blob) {
  try {
    const url = URL.createObjectURL(blob);
    const a = document.createElement('a');
    a.href = url;
    a.download = name;
    document.body.appendChild(a);
    a.click();
    a.remove();
    URL.revokeObjectURL(url);
  } catch (e) {
    console.error('Failed to save blob', e);
  }
}

export function toCSV(rows: string[][]): string {
  const esc = (s: string) => (/[,\n"]/).test(s) ? '"' + s.replace(/"/g, '""') + '"' : s;
  return rows.map(r => r.map(esc).join(',')).join('\n');
}

export function exportCsv(filename: string, csv: string) {
  saveBlob(filename.endsWith('.csv') ? filename : `${filename}.csv`, new Blob([csv], { type: 'text/csv;charset=utf-8' }));
}

export function exportJson(filename: string, json: string) {
  saveBlob(filename.endsWith('.json') ? filename : `${filename}.json`, new Blob([json], { type: 'application/json;charset=utf-8' }));
}

export function exportPdf(filename: string, bytes: Uint8Array) {
  saveBlob(filename.endsWith('.pdf') ? filename : `${filename}.pdf`, new Blob([Uint8Array.from(bytes)], { type: 'application/pdf' }));
}
