import { Link, useLocation } from "react-router-dom";

export default function NotFound() {
  const { pathname } = useLocation();

  return (
    <main className="not-found">
      <h1>404</h1>
      <p>
        Nothing grows at <code>{pathname}</code>.
      </p>
      <Link to="/">Back to the orchard</Link>
    </main>
  );
}
