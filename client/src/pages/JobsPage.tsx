import { useState, useEffect, useCallback } from 'react';
import {
  fetchJobs, fetchStats, fetchCompanies, clearCache,
  type Job, type Stats, type Filters,
} from '../api';

function formatDate(d: string | null): string {
  if (!d) return '';
  // Snapshot timestamps carry no zone and are UTC.
  const date = new Date(/[zZ]|[+-]\d{2}:?\d{2}$/.test(d) ? d : `${d}Z`);
  if (Number.isNaN(date.getTime())) return d;
  return date.toLocaleDateString('en-US', { month: 'short', day: 'numeric' });
}

const border = '1px solid #30363d';

const control = {
  background: '#0d1117', border, borderRadius: 6, color: '#e1e4e8',
  padding: '6px 12px', fontSize: 14, outline: 'none',
};

const styles = {
  statsBar: { display: 'flex', gap: 16, marginBottom: 20, flexWrap: 'wrap' as const },
  statCard: { background: '#161b22', border, borderRadius: 8, padding: '12px 20px', minWidth: 120 },
  statLabel: { fontSize: 12, color: '#8b949e', marginBottom: 4, textTransform: 'uppercase' as const },
  statValue: { fontSize: 20, fontWeight: 700 as const },
  filterBar: { display: 'flex', gap: 12, marginBottom: 20, flexWrap: 'wrap' as const, alignItems: 'center' },
  keyword: { ...control, minWidth: 220 },
  location: { ...control, width: 160 },
  company: control,
  refresh: {
    background: '#21262d', border, borderRadius: 6, color: '#c9d1d9',
    padding: '8px 16px', fontSize: 14, cursor: 'pointer',
  },
  panel: { background: '#161b22', border, borderRadius: 8, overflow: 'hidden' },
  table: { width: '100%', borderCollapse: 'collapse' as const, fontSize: 14 },
  th: {
    textAlign: 'left' as const, padding: '8px 16px', fontSize: 12, color: '#8b949e',
    borderBottom: border, fontWeight: 600 as const,
  },
  td: { padding: '12px 16px', borderBottom: '1px solid #21262d', verticalAlign: 'top' as const },
  muted: { fontSize: 13, color: '#8b949e' },
  link: { color: '#58a6ff', textDecoration: 'none' },
  empty: { padding: 40, textAlign: 'center' as const, color: '#8b949e' },
  error: { fontSize: 13, color: '#f85149' },
};

function StatCard({ label, value, small }: { label: string; value: string | number; small?: boolean }) {
  return (
    <div style={styles.statCard}>
      <div style={styles.statLabel}>{label}</div>
      <div style={small ? { ...styles.statValue, fontSize: 14 } : styles.statValue}>{value}</div>
    </div>
  );
}

export default function JobsPage() {
  const [jobs, setJobs] = useState<Job[]>([]);
  const [loaded, setLoaded] = useState(0);
  const [stats, setStats] = useState<Stats | null>(null);
  const [companies, setCompanies] = useState<string[]>([]);
  const [filters, setFilters] = useState<Filters>({});
  const [loading, setLoading] = useState(false);
  const [refreshing, setRefreshing] = useState(false);
  const [error, setError] = useState('');

  const loadCompanies = useCallback(() => {
    fetchCompanies().then(setCompanies).catch(console.error);
  }, []);

  useEffect(() => { loadCompanies(); }, [loadCompanies]);

  const loadJobs = useCallback(async () => {
    setLoading(true);
    try {
      const [jobsData, statsData] = await Promise.all([
        fetchJobs(filters),
        fetchStats(),
      ]);
      setJobs(jobsData.jobs);
      setLoaded(jobsData.loaded);
      setStats(statsData);
      setError('');
    } catch (e) {
      console.error('Failed to load:', e);
      setError('Could not load jobs.');
    } finally {
      setLoading(false);
    }
  }, [filters]);

  useEffect(() => { void loadJobs(); }, [loadJobs]);

  const handleRefresh = async () => {
    setRefreshing(true);
    try {
      await clearCache();
      await loadJobs();
      loadCompanies();
    } catch (e) {
      console.error('Refresh failed:', e);
      setError('Refresh failed.');
    } finally {
      setRefreshing(false);
    }
  };

  const updateFilter = (key: keyof Filters, value: string) => {
    setFilters(f => ({ ...f, [key]: value || undefined }));
  };

  return (
    <>
      <div style={styles.statsBar}>
        <StatCard label="Total Jobs" value={stats?.total ?? 0} />
        <StatCard label="Employers" value={companies.length} />
        <StatCard label="Last Scrape" value={stats?.lastScrape ? formatDate(stats.lastScrape) : 'Never'} small />
      </div>

      {/* Filters */}
      <div style={styles.filterBar}>
        <input
          type="text"
          placeholder="Search job titles..."
          aria-label="Keyword"
          style={styles.keyword}
          value={filters.keyword ?? ''}
          onChange={e => updateFilter('keyword', e.target.value)}
        />
        <select
          aria-label="Company"
          style={styles.company}
          value={filters.company ?? ''}
          onChange={e => updateFilter('company', e.target.value)}
        >
          <option value="">All Companies</option>
          {companies.map(c => (
            <option key={c} value={c}>{c}</option>
          ))}
        </select>
        <input
          type="text"
          placeholder="City or state..."
          aria-label="Location"
          style={styles.location}
          value={filters.location ?? ''}
          onChange={e => updateFilter('location', e.target.value)}
        />
        <span style={{ flex: 1 }} />
        {error && <span style={styles.error}>{error}</span>}
        <button style={styles.refresh} disabled={refreshing} onClick={handleRefresh}>
          {refreshing ? 'Refreshing...' : 'Refresh data'}
        </button>
      </div>

      <div style={styles.panel}>
        {loading && <div style={styles.empty}>Loading...</div>}

        {!loading && loaded === 0 && (
          <div style={styles.empty}>No jobs available yet. Come back after the next run.</div>
        )}

        {!loading && loaded > 0 && jobs.length === 0 && (
          <div style={styles.empty}>No results match your filters.</div>
        )}

        {!loading && jobs.length > 0 && (
          <table style={styles.table}>
            <thead>
              <tr>
                <th style={styles.th}>Job Title</th>
                <th style={styles.th}>Company</th>
                <th style={styles.th}>Salary</th>
                <th style={styles.th}>Location</th>
                <th style={styles.th}>Link</th>
              </tr>
            </thead>
            <tbody>
              {jobs.map(job => (
                <tr key={job.id}>
                  <td style={{ ...styles.td, fontWeight: 600 }}>{job.title}</td>
                  <td style={styles.td}>{job.company}</td>
                  <td style={{ ...styles.td, ...styles.muted }}>{job.salary ?? ''}</td>
                  <td style={{ ...styles.td, ...styles.muted }}>{job.location ?? ''}</td>
                  <td style={styles.td}>
                    <a href={job.url} target="_blank" rel="noopener noreferrer" style={styles.link}>
                      Open
                    </a>
                  </td>
                </tr>
              ))}
            </tbody>
          </table>
        )}
      </div>
    </>
  );
}
