import JobsPage from './pages/JobsPage';

const layout = {
  page: { maxWidth: 1200, margin: '0 auto', padding: '24px' },
  header: { marginBottom: 24, paddingBottom: 16, borderBottom: '1px solid #21262d' },
  title: { fontSize: 24, fontWeight: 700 as const, margin: 0 },
  tagline: { color: '#8b949e', fontSize: 14, marginTop: 4 },
};

export default function App() {
  return (
    <main style={layout.page}>
      <header style={layout.header}>
        <h1 style={layout.title}>Panhandle Job Board</h1>
        <div style={layout.tagline}>Openings posted by Amarillo-area employers</div>
      </header>
      <JobsPage />
    </main>
  );
}
