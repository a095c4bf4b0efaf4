import { ENGINE_VERSION, CONTRACT_VERSION } from '../contracts/versions';

export default function Footer({ onMethodology }: { onMethodology: () => void }) {
  return (
    <footer className="site-footer">
      <nav className="footer-links">
        <button className="footer-link" onClick={onMethodology}>Methodology</button>
      </nav>
      <p className="footer-meta">
        Engine v{ENGINE_VERSION} &nbsp;·&nbsp; Report contract v{CONTRACT_VERSION}
      </p>
    </footer>
  );
}
