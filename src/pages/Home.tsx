import { Link } from "react-router-dom";
import { Play } from "lucide-react";

import appleUrl from "../components/apples-and-pears/assets/apple.svg";
import pearUrl from "../components/apples-and-pears/assets/pear.svg";
import { DEFAULT_CONFIG } from "../components/apples-and-pears/config";

export default function Home() {
  return (
    <main className="home">
      <section>
        <div className="home__pieces" aria-hidden="true">
          <img src={appleUrl} alt="" />
          <img src={pearUrl} alt="" />
        </div>
        <h1>{DEFAULT_CONFIG.title}</h1>
        <p>Three in a row. You are the apple; the pear moves on its own.</p>
        <Link className="home__play" to="/game/apples-and-pears">
          <Play size={18} /> Play
        </Link>
      </section>
    </main>
  );
}
