import type { BatchRunState } from "@/components/types";

type Props = {
  batch: BatchRunState;
};

export default function StatusCard(props: Props) {
  const progress = props.batch.progress;
  const completionPercent = progress ? Math.round(progress.fraction * 100) : 0;

  return (
    <section className="hs-card">
      <div className="hs-cardHead">
        <h2 className="hs-cardTitle">Batch progress</h2>
        {props.batch.running && <div className="hs-subtle">Running</div>}
      </div>

      <div className="hs-cardBody">
        {progress ? (
          <>
            <div style={{ display: "flex", justifyContent: "space-between", gap: 10 }}>
              <div style={{ fontSize: 13 }}>
                Last: <strong>{progress.company}</strong>
              </div>
              <div className="hs-subtle">
                {progress.index} of {progress.total} records
              </div>
            </div>

            <div style={{ marginTop: 10, marginBottom: 8 }}>
              <div className="hs-progress">
                <div className="hs-progressFill" style={{ width: `${completionPercent}%` }} />
              </div>
            </div>

            <div className="hs-subtle">
              {completionPercent}% complete, {progress.completed} results recorded
            </div>
          </>
        ) : (
          <div className="hs-subtle">No batch running. Start one to see progress.</div>
        )}
      </div>
    </section>
  );
}
