/**
 * Member Check Report: HTML report of an AISC 360 W-section check
 */

import type {
  ElementClass,
  ICompressionResult,
  IInteractionOutcome,
  IMemberCheckResult,
  ISectionClassification,
  IStrongAxisFlexureResult,
  ITensionResult,
  IWeakAxisFlexureResult,
} from '../standards/types';

export interface MemberReportOptions {
  /** Force unit label, e.g. 'kgf' */
  forceUnit?: string;
  /** Length unit label, e.g. 'cm' */
  lengthUnit?: string;
  /** Stress unit label, e.g. 'kgf/cm²' */
  stressUnit?: string;
}

interface Units {
  force: string;
  length: string;
  stress: string;
  moment: string;
}

function resolveUnits(opts: MemberReportOptions): Units {
  const force = opts.forceUnit ?? 'kgf';
  const length = opts.lengthUnit ?? 'cm';
  return { force, length, stress: opts.stressUnit ?? `${force}/${length}²`, moment: `${force}-${length}` };
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function fmtVal(v: number, decimals: number = 2): string {
  if (!Number.isFinite(v)) return '&infin;';
  return v.toFixed(decimals);
}

function ucColor(uc: number): string {
  if (uc <= 0.85) return '#22c55e';
  if (uc <= 1.0) return '#f59e0b';
  return '#ef4444';
}

function statusCell(status: string): string {
  return `<td class="${status === 'OK' ? 'ok' : 'fail'}">${status}</td>`;
}

function ratioLine(label: string, ratio: number): string {
  return `<div class="formula">${label} = <strong style="color:${ucColor(ratio)}">${fmtVal(ratio, 3)}</strong></div>`;
}

const CLASS_LABEL: Record<ElementClass, string> = {
  compact: 'Compact',
  noncompact: 'Noncompact',
  slender: 'Slender',
};

function renderClassification(c: ISectionClassification): string {
  const r = c.ratios;
  return `<table>
  <tr><th>Element</th><th>&lambda;</th><th>&lambda;<sub>p</sub></th><th>&lambda;<sub>r</sub></th><th>Class</th></tr>
  <tr><td>Flange (compression)</td><td>${fmtVal(r.lambdaF)}</td><td>${fmtVal(r.lambdaPFComp)}</td><td>${fmtVal(r.lambdaRFComp)}</td><td>${CLASS_LABEL[c.flangeCompression]}</td></tr>
  <tr><td>Flange (flexure)</td><td>${fmtVal(r.lambdaF)}</td><td>${fmtVal(r.lambdaPFFlex)}</td><td>${fmtVal(r.lambdaRFFlex)}</td><td>${CLASS_LABEL[c.flangeFlexure]}</td></tr>
  <tr><td>Web (flexure)</td><td>${fmtVal(r.lambdaW)}</td><td>${fmtVal(r.lambdaPWFlex)}</td><td>${fmtVal(r.lambdaRWFlex)}</td><td>${CLASS_LABEL[c.webFlexure]}</td></tr>
</table>`;
}

function renderTension(t: ITensionResult, u: Units): string {
  return `<div class="check-block">
    <div class="check-title">Tension — AISC 360 Chapter D (${t.equations.join(', ')})</div>
    <div class="formula">&phi;P<sub>n</sub> (yielding) = ${fmtVal(t.PtYielding, 1)} ${u.force}</div>
    <div class="formula">&phi;P<sub>n</sub> (rupture) = ${fmtVal(t.PtRupture, 1)} ${u.force}</div>
    <div class="formula-filled">P<sub>t</sub> = ${fmtVal(t.Pt, 1)} ${u.force} (governing: ${t.governingMode})</div>
    ${ratioLine(`P<sub>u</sub> / P<sub>t</sub> = ${fmtVal(Math.abs(t.Pu), 1)} / ${fmtVal(t.Pt, 1)}`, t.ratio)}
  </div>`;
}

function renderCompression(c: ICompressionResult, u: Units): string {
  const slender = c.path === 'slender'
    ? `<div class="formula-filled">A<sub>e</sub> = ${fmtVal(c.Ae)} ${u.length}² &nbsp; F<sub>y,mod</sub> = ${fmtVal(c.FyMod, 1)} ${u.stress} &nbsp; b<sub>e,flange</sub> = ${fmtVal(c.beFlange)} ${u.length} &nbsp; b<sub>e,web</sub> = ${fmtVal(c.beWeb)} ${u.length}</div>`
    : '';
  return `<div class="check-block">
    <div class="check-title">Compression — AISC 360 ${c.path === 'slender' ? 'E7 (slender elements)' : 'E3'} (${c.equations.join(', ')})</div>
    <div class="formula">KL/r<sub>x</sub> = ${fmtVal(c.KLrX, 1)} &nbsp; KL/r<sub>y</sub> = ${fmtVal(c.KLrY, 1)} &nbsp; KL/r = ${fmtVal(c.KLr, 1)}</div>
    <div class="formula-filled">F<sub>e</sub> = ${fmtVal(c.Fe, 1)} ${u.stress} &nbsp; F<sub>cr</sub> = ${fmtVal(c.Fcr, 1)} ${u.stress} (${c.bucklingMode} buckling)</div>
    ${slender}
    <div class="formula-filled">P<sub>n</sub> = ${fmtVal(c.Pn, 1)} ${u.force} &nbsp; &phi;P<sub>n</sub> = ${fmtVal(c.Pc, 1)} ${u.force}</div>
    ${ratioLine(`P<sub>u</sub> / &phi;P<sub>n</sub> = ${fmtVal(c.Pu, 1)} / ${fmtVal(c.Pc, 1)}`, c.ratio)}
  </div>`;
}

function renderStrongAxis(f: IStrongAxisFlexureResult, u: Units): string {
  return `<div class="check-block">
    <div class="check-title">Flexure, strong axis — AISC 360 F2 (${f.equations.join(', ')})</div>
    <div class="formula">L<sub>p</sub> = ${fmtVal(f.Lp)} ${u.length} &nbsp; L<sub>r</sub> = ${fmtVal(f.Lr)} ${u.length} &nbsp; L<sub>b</sub> = ${fmtVal(f.Lt)} ${u.length} &nbsp; r<sub>ts</sub> = ${fmtVal(f.rts)} ${u.length}</div>
    <div class="formula-filled">M<sub>n</sub> = ${fmtVal(f.Mn, 1)} ${u.moment} (${f.limitState}${f.cappedAtPlastic ? ', limited to M<sub>p</sub>' : ''}) &nbsp; &phi;M<sub>n</sub> = ${fmtVal(f.Mb, 1)} ${u.moment}</div>
    ${ratioLine(`M<sub>ux</sub> / &phi;M<sub>n</sub> = ${fmtVal(f.Mu, 1)} / ${fmtVal(f.Mb, 1)}`, f.ratio)}
  </div>`;
}

function renderWeakAxis(f: IWeakAxisFlexureResult, u: Units): string {
  return `<div class="check-block">
    <div class="check-title">Flexure, weak axis — AISC 360 F6 (${f.equations.join(', ')})</div>
    <div class="formula-filled">M<sub>n</sub> = ${fmtVal(f.Mn, 1)} ${u.moment} (${f.limitState}, flange ${f.classification}) &nbsp; &phi;M<sub>n</sub> = ${fmtVal(f.Mb, 1)} ${u.moment}</div>
    ${ratioLine(`M<sub>uy</sub> / &phi;M<sub>n</sub> = ${fmtVal(f.Mu, 1)} / ${fmtVal(f.Mb, 1)}`, f.ratio)}
  </div>`;
}

function renderInteraction(i: IInteractionOutcome): string {
  if (i.outcome === 'missing-prerequisite') {
    return `<div class="check-block">
    <div class="check-title">Interaction — AISC 360 Chapter H</div>
    <div class="check-result result-fail">${escapeHtml(i.note)}</div>
  </div>`;
  }
  return `<div class="check-block">
    <div class="check-title">Interaction — AISC 360 ${i.equation}</div>
    <div class="formula">P<sub>r</sub>/P<sub>c</sub> = ${fmtVal(i.PrPc, 3)} &nbsp; M<sub>rx</sub>/M<sub>cx</sub> = ${fmtVal(i.MrxMcx, 3)} &nbsp; M<sub>ry</sub>/M<sub>cy</sub> = ${fmtVal(i.MryMcy, 3)}</div>
    ${ratioLine('Interaction value', i.value)}
  </div>`;
}

interface SummaryRow {
  name: string;
  ratio: number;
  status: string;
}

function summaryRows(result: IMemberCheckResult): SummaryRow[] {
  const rows: SummaryRow[] = [];
  if (result.tension) rows.push({ name: 'Tension', ratio: result.tension.ratio, status: result.tension.status });
  if (result.compression) rows.push({ name: 'Compression', ratio: result.compression.ratio, status: result.compression.status });
  if (result.strongAxisFlexure) rows.push({ name: 'Flexure (strong axis)', ratio: result.strongAxisFlexure.ratio, status: result.strongAxisFlexure.status });
  if (result.weakAxisFlexure) rows.push({ name: 'Flexure (weak axis)', ratio: result.weakAxisFlexure.ratio, status: result.weakAxisFlexure.status });
  if (result.interaction?.outcome === 'evaluated') {
    rows.push({ name: 'Interaction', ratio: result.interaction.value, status: result.interaction.status });
  }
  return rows;
}

/**
 * Generate a standalone HTML report for one member check.
 */
export function generateMemberCheckReport(
  result: IMemberCheckResult,
  label: string,
  opts: MemberReportOptions = {}
): string {
  const u = resolveUnits(opts);
  const title = escapeHtml(label);
  const rows = summaryRows(result);
  const ok = result.summary.status === 'OK';

  const details = [
    result.tension ? renderTension(result.tension, u) : '',
    result.compression ? renderCompression(result.compression, u) : '',
    result.strongAxisFlexure ? renderStrongAxis(result.strongAxisFlexure, u) : '',
    result.weakAxisFlexure ? renderWeakAxis(result.weakAxisFlexure, u) : '',
    result.interaction ? renderInteraction(result.interaction) : '',
  ].filter(s => s).join('\n');

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<title>Member Check — ${title}</title>
<style>
  body { font-family: 'Segoe UI', Tahoma, Geneva, sans-serif; background: #f8f9fa; color: #1a1a2e; padding: 24px; font-size: 12px; line-height: 1.5; }
  .page { max-width: 850px; margin: 0 auto; background: white; padding: 40px; }
  h1 { font-size: 22px; margin-bottom: 4px; }
  h2 { font-size: 16px; margin: 28px 0 8px; border-bottom: 2px solid #1a1a2e; padding-bottom: 4px; }
  table { width: 100%; border-collapse: collapse; margin: 8px 0 16px; }
  th, td { padding: 5px 8px; text-align: right; border-bottom: 1px solid #e2e8f0; font-size: 11px; }
  th:first-child, td:first-child { text-align: left; }
  .ok { color: #22c55e; font-weight: 700; }
  .fail { color: #ef4444; font-weight: 700; }
  .summary-box { padding: 10px 16px; border-radius: 6px; margin: 12px 0; font-weight: 600; font-size: 13px; }
  .summary-ok { background: #f0fdf4; border: 1px solid #22c55e; color: #166534; }
  .summary-fail { background: #fef2f2; border: 1px solid #ef4444; color: #991b1b; }
  .check-block { margin: 8px 0; padding: 6px 0; }
  .check-title { font-size: 11px; font-weight: 700; color: #475569; margin-bottom: 2px; }
  .formula { font-size: 11px; color: #64748b; margin: 1px 0; padding-left: 12px; }
  .formula-filled { font-size: 11px; color: #1a1a2e; margin: 1px 0; padding-left: 12px; }
  .check-result { padding: 6px 12px; border-radius: 4px; font-size: 11px; font-weight: 600; margin-top: 8px; }
  .result-fail { background: #fef2f2; border: 1px solid #fecaca; color: #991b1b; }
</style>
</head>
<body>
<div class="page">

<h1>Member Check — ${title}</h1>
<p style="color:#64748b;margin-bottom:16px">AISC 360 (LRFD) W-section verification</p>

<h2>1. Section Classification</h2>
${renderClassification(result.classification)}

<h2>2. Summary</h2>
${rows.length > 0 ? `<table>
  <tr><th>Check</th><th>Ratio</th><th>Status</th></tr>
  ${rows.map(r => `<tr><td>${r.name}</td><td>${fmtVal(r.ratio, 3)}</td>${statusCell(r.status)}</tr>`).join('\n  ')}
</table>` : '<p style="color:#94a3b8">No load applied; only the classification was evaluated.</p>'}
<div class="summary-box ${ok ? 'summary-ok' : 'summary-fail'}">Max ratio = ${fmtVal(result.summary.maxRatio, 3)} — ${ok ? 'ALL CHECKS PASSED' : 'SOME CHECKS FAILED'}</div>

${details ? `<h2>3. Detailed Checks</h2>\n${details}` : ''}

</div>
</body>
</html>`;
}

/**
 * Download the report as an HTML file (browser only)
 */
export function downloadMemberCheckReport(result: IMemberCheckResult, label: string, opts: MemberReportOptions = {}): void {
  const html = generateMemberCheckReport(result, label, opts);
  const blob = new Blob([html], { type: 'text/html' });
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = `${label || 'member'}_check.html`;
  document.body.appendChild(a);
  a.click();
  document.body.removeChild(a);
  URL.revokeObjectURL(url);
}
