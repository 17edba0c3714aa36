import { useState, useMemo, useCallback, useEffect } from 'react';
import { Terminal } from 'lucide-react';
import { WSectionLibrary } from './core/section/WSectionLibrary';
import { DEFAULT_STEEL_GRADE, STEEL_GRADES } from './core/standards/AISC360';
import { isDesignCheckError } from './core/standards/errors';
import { checkMember, logMemberCheck } from './core/standards/MemberCheck';
import type { ILoadConditions, IMemberCheckResult } from './core/standards/types';
import { downloadMemberCheckReport } from './core/export/MemberCheckReport';
import { MemberCheckPanel } from './components/MemberCheckPanel/MemberCheckPanel';
import { ConsolePanel } from './components/ConsolePanel/ConsolePanel';
import './App.css';

type LoadField = keyof Required<ILoadConditions>;

const LOAD_FIELDS: { key: LoadField; label: string; unit: string }[] = [
  { key: 'Pu', label: 'Pu (+ tension)', unit: 'kgf' },
  { key: 'Mux', label: 'Mux', unit: 'kgf-cm' },
  { key: 'Muy', label: 'Muy', unit: 'kgf-cm' },
  { key: 'L', label: 'L', unit: 'cm' },
  { key: 'Lx', label: 'KLx', unit: 'cm' },
  { key: 'Ly', label: 'KLy', unit: 'cm' },
  { key: 'Lt', label: 'Lb', unit: 'cm' },
  { key: 'Cb', label: 'Cb', unit: '' },
];

const INITIAL_LOADS: Required<ILoadConditions> = {
  Pu: -10000, Mux: 100000, Muy: 0, L: 300, Lx: 300, Ly: 300, Lt: 300, Cb: 1.0,
};

interface CheckState {
  result: IMemberCheckResult | null;
  error: string | null;
}

function App() {
  const seriesList = useMemo(() => WSectionLibrary.listSeries(), []);
  const [series, setSeries] = useState('W8');
  const designations = useMemo(() => WSectionLibrary.listSectionsInSeries(series), [series]);
  const [designation, setDesignation] = useState('W8X10');
  const [gradeName, setGradeName] = useState(DEFAULT_STEEL_GRADE.name);
  const [loads, setLoads] = useState<Required<ILoadConditions>>(INITIAL_LOADS);
  const [showConsole, setShowConsole] = useState(false);

  const activeDesignation = designations.includes(designation) ? designation : designations[0] ?? '';

  const check = useMemo<CheckState>(() => {
    const grade = STEEL_GRADES.find(g => g.name === gradeName) ?? DEFAULT_STEEL_GRADE;
    try {
      const section = WSectionLibrary.getSection(activeDesignation, grade);
      return { result: checkMember(section, loads, { log: false }), error: null };
    } catch (err) {
      if (!isDesignCheckError(err)) throw err;
      return { result: null, error: err.message };
    }
  }, [activeDesignation, gradeName, loads]);

  // Console writes notify the console panel, so they run after render
  useEffect(() => {
    if (check.result) logMemberCheck(check.result);
  }, [check.result]);

  const updateLoad = useCallback((key: LoadField, raw: string) => {
    const value = parseFloat(raw);
    if (!Number.isFinite(value)) return;
    setLoads(prev => ({ ...prev, [key]: value }));
  }, []);

  return (
    <div className="app">
      <header className="app-header">
        <span className="app-title">W-Section Member Check</span>
        <button className="app-header-btn" onClick={() => setShowConsole(v => !v)} title="Toggle console">
          <Terminal size={16} />
        </button>
      </header>

      <main className="app-main">
        <aside className="app-inputs">
          <label>
            Series
            <select value={series} onChange={e => setSeries(e.target.value)}>
              {seriesList.map(s => <option key={s} value={s}>{s}</option>)}
            </select>
          </label>
          <label>
            Section
            <select value={activeDesignation} onChange={e => setDesignation(e.target.value)}>
              {designations.map(d => <option key={d} value={d}>{d}</option>)}
            </select>
          </label>
          <label>
            Grade
            <select value={gradeName} onChange={e => setGradeName(e.target.value)}>
              {STEEL_GRADES.map(g => (
                <option key={g.name} value={g.name}>{g.name} (Fy={g.Fy} kgf/cm²)</option>
              ))}
            </select>
          </label>
          {LOAD_FIELDS.map(f => (
            <label key={f.key}>
              {f.label}{f.unit && ` [${f.unit}]`}
              <input
                type="number"
                defaultValue={loads[f.key]}
                onChange={e => updateLoad(f.key, e.target.value)}
              />
            </label>
          ))}
        </aside>

        <section className="app-results">
          {check.error && <div className="app-error">{check.error}</div>}
          {check.result && (
            <MemberCheckPanel
              result={check.result}
              label={activeDesignation}
              onOpenReport={() => {
                if (check.result) downloadMemberCheckReport(check.result, activeDesignation);
              }}
            />
          )}
        </section>
      </main>

      {showConsole && <ConsolePanel onClose={() => setShowConsole(false)} />}
    </div>
  );
}

export default App;
