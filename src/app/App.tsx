import { Routes, Route } from "react-router-dom";

import Home from "../pages/Home";
import NotFound from "../pages/NotFound";
import ApplesAndPearsGame from "../components/apples-and-pears/ApplesAndPearsGame";

export default function App() {
  return (
    <div className="app-layout">
      <div className="app-body">
        <Routes>
          <Route path="/" element={<Home />} />
          <Route path="/game/apples-and-pears" element={<ApplesAndPearsGame />} />

          {/* always last */}
          <Route path="*" element={<NotFound />} />
        </Routes>
      </div>
    </div>
  );
}
