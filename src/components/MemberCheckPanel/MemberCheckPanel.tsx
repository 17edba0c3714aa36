import { CheckCircle2, FileText, XCircle } from 'lucide-react';
import type { CheckName, IMemberCheckResult } from '../../core/standards/types';
import './MemberCheckPanel.css';

interface MemberCheckPanelProps {
  result: IMemberCheckResult;
  label: string;
  onOpenReport?: () => void;
}

interface CheckRow {
  name: CheckName;
  title: string;
  reference: string;
  detail: string;
  ratio: number;
  status: 'OK' | 'FAIL';
}

const CHECK_TITLES: Record<CheckName, string> = {
  tension: 'Tension',
  compression: 'Compression',
  strongAxisFlexure: 'Flexure X',
  weakAxisFlexure: 'Flexure Y',
  interaction: 'Interaction',
};

/** Rows for every evaluated check, in check order */
export function buildCheckRows(result: IMemberCheckResult): CheckRow[] {
  const rows: CheckRow[] = [];
  const { tension, compression, strongAxisFlexure, weakAxisFlexure, interaction } = result;
  if (tension) {
    rows.push({
      name: 'tension', title: CHECK_TITLES.tension, reference: 'D2',
      detail: `governed by ${tension.governingMode}`,
      ratio: tension.ratio, status: tension.status,
    });
  }
  if (compression) {
    rows.push({
      name: 'compression', title: CHECK_TITLES.compression,
      reference: compression.path === 'slender' ? 'E7' : 'E3',
      detail: `${compression.bucklingMode} buckling, KL/r = ${compression.KLr.toFixed(1)}`,
      ratio: compression.ratio, status: compression.status,
    });
  }
  if (strongAxisFlexure) {
    rows.push({
      name: 'strongAxisFlexure', title: CHECK_TITLES.strongAxisFlexure, reference: 'F2',
      detail: strongAxisFlexure.limitState,
      ratio: strongAxisFlexure.ratio, status: strongAxisFlexure.status,
    });
  }
  if (weakAxisFlexure) {
    rows.push({
      name: 'weakAxisFlexure', title: CHECK_TITLES.weakAxisFlexure, reference: 'F6',
      detail: weakAxisFlexure.limitState,
      ratio: weakAxisFlexure.ratio, status: weakAxisFlexure.status,
    });
  }
  if (interaction?.outcome === 'evaluated') {
    rows.push({
      name: 'interaction', title: CHECK_TITLES.interaction, reference: interaction.equation,
      detail: `Pr/Pc = ${interaction.PrPc.toFixed(3)}`,
      ratio: interaction.value, status: interaction.status,
    });
  }
  return rows;
}

/** Return CSS class for a ratio */
function ratioClass(value: number): string {
  if (value <= 0.85) return 'ratio-ok';
  if (value <= 1.0) return 'ratio-warn';
  return 'ratio-fail';
}

export function MemberCheckPanel({ result, label, onOpenReport }: MemberCheckPanelProps) {
  const rows = buildCheckRows(result);
  const { summary, classification } = result;
  const ok = summary.status === 'OK';

  return (
    <div className="member-check-panel">
      <div className="member-check-header">
        <span>{label} — AISC 360 (LRFD)</span>
        {onOpenReport && (
          <button className="member-check-report-btn" onClick={onOpenReport} title="Open HTML report">
            <FileText size={14} />
          </button>
        )}
      </div>

      <div className="member-check-classification">
        Flange {classification.flangeCompression} (compression), {classification.flangeFlexure} (flexure) | Web {classification.webFlexure}
      </div>

      {rows.length === 0 ? (
        <div className="member-check-empty">No loads applied.</div>
      ) : (
        <table className="member-check-table">
          <thead>
            <tr>
              <th>Check</th>
              <th>Ref.</th>
              <th>Limit state</th>
              <th>Ratio</th>
              <th>Status</th>
            </tr>
          </thead>
          <tbody>
            {rows.map(r => (
              <tr key={r.name} className={summary.governingCheck === r.name ? 'member-check-governing' : undefined}>
                <td>{r.title}</td>
                <td>{r.reference}</td>
                <td>{r.detail}</td>
                <td className={ratioClass(r.ratio)}>{r.ratio.toFixed(3)}</td>
                <td className="member-check-status">
                  {r.status === 'OK'
                    ? <CheckCircle2 size={14} className="status-ok" />
                    : <XCircle size={14} className="status-fail" />}
                  {r.status}
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      )}

      <div className={`member-check-summary ${ok ? 'summary-ok' : 'summary-fail'}`}>
        Max ratio: {summary.maxRatio.toFixed(3)}
        {summary.governingCheck && ` (${CHECK_TITLES[summary.governingCheck]})`} | {ok ? 'All OK' : 'FAIL'}
      </div>
    </div>
  );
}
