import type { FormEvent } from "react";

type Props = {
  username: string;
  setUsername: (v: string) => void;
  loggingIn: boolean;
  error: string | null;
  onLogin: (e: FormEvent) => void;
};

export default function LoginCard(props: Props) {
  return (
    <section className="hs-card hs-login">
      <div className="hs-cardHead">
        <h2 className="hs-cardTitle">User authentication required</h2>
      </div>

      <div className="hs-cardBody">
        <div className="hs-subtle" style={{ marginBottom: 12 }}>
          Please enter your username to access the dashboard.
        </div>

        {props.error && <div className="hs-alert hs-alertError">{props.error}</div>}

        <form onSubmit={props.onLogin}>
          <div className="hs-field">
            <div className="hs-label">Username</div>
            <input
              className="hs-input"
              type="text"
              value={props.username}
              onChange={(e) => props.setUsername(e.target.value)}
              placeholder="Enter your username"
              autoFocus
            />
          </div>

          <button
            type="submit"
            className="hs-btn hs-btn-primary"
            disabled={props.loggingIn || !props.username.trim()}
          >
            {props.loggingIn ? "Checking..." : "Login"}
          </button>
        </form>
      </div>
    </section>
  );
}
