import { MAX_DISTANCE_MM } from '../wheel/distances';

const EXAMPLE_DISTANCES = '2, 3, 4, 5, 8, 12, 18, 25';

const printingTips = [
  'Material: PLA or PETG.',
  'Layer height 0.16 to 0.20 mm; fine tips print better with thin layers.',
  'Print flat, with the wheel lying on the bed.',
  'Check the prong tips and deburr lightly if needed.',
];

export default function HomePage() {
  return (
    <main style={{ maxWidth: 640, margin: '0 auto', padding: '48px 16px' }}>
      <h1 style={{ marginBottom: 8 }}>2PD Wheel Generator</h1>
      <p style={{ color: '#475569', marginTop: 0 }}>
        Enter the prong separations you want on the wheel, in millimeters, separated by commas.
        Each distance gets its own face with a pair of prongs and an engraved label.
      </p>

      <form action="/generate" method="post" style={{ display: 'grid', gap: 12 }}>
        <label htmlFor="distances_mm">Distances (mm), between 0 and {MAX_DISTANCE_MM}</label>
        <input
          id="distances_mm"
          name="distances_mm"
          type="text"
          required
          placeholder={EXAMPLE_DISTANCES}
          style={{ padding: 8, fontSize: 16 }}
        />
        <label htmlFor="format">STL format</label>
        <select id="format" name="format" defaultValue="binary" style={{ padding: 8 }}>
          <option value="binary">Binary (smaller)</option>
          <option value="ascii">ASCII (readable)</option>
        </select>
        <button type="submit" style={{ padding: '10px 16px', fontSize: 16 }}>
          Generate STL
        </button>
      </form>

      <h2 style={{ marginTop: 40 }}>Printing</h2>
      <ul>
        {printingTips.map((tip) => (
          <li key={tip}>{tip}</li>
        ))}
      </ul>
      <p style={{ color: '#64748b', fontSize: 14 }}>
        For education and demonstration. Not evaluated as a medical device.
      </p>
    </main>
  );
}
