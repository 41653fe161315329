import type { Snapshot, UIState } from '../../domain/types';
import {
  COLOR_HEX,
  REFRESH_INTERVAL_MS,
  budgetBarColor,
  budgetBarWidth,
  buttonGradient,
  clockTime,
  formatKRW,
  formatRate,
  formatUSD,
  statusColor,
  truncateModelName,
} from '../../domain/computations';

interface CostWidgetProps {
  state: UIState;
  apiBase: string;
  onToggle: () => void;
}

function footerText(state: UIState): string {
  if (state.phase === 'error') return '연결 실패';
  if (state.lastUpdateTimestamp === null) return '대기 중...';
  return `${clockTime(state.lastUpdateTimestamp)} 업데이트 | ${REFRESH_INTERVAL_MS / 1000}초마다 자동 새로고침`;
}

function SnapshotCards({ snapshot }: { snapshot: Snapshot }) {
  const { today, monthly, alltime, budget, exchange_rate, models } = snapshot;
  const barColor = budgetBarColor(budget.used_pct);
  const dotColor = statusColor(budget.status);

  return (
    <>
      <div className="cw-card cw-card--today">
        <div className="cw-card-label">오늘 비용</div>
        <div className="cw-card-value">{formatKRW(today.krw)}</div>
        <div className="cw-card-sub">{`${formatUSD(today.usd)} USD`}</div>
      </div>

      <div className="cw-card cw-card--monthly">
        <div className="cw-card-label">이번달 누적</div>
        <div className="cw-card-value">{formatKRW(monthly.krw)}</div>
        <div className="cw-card-sub">{`${formatUSD(monthly.usd)} USD`}</div>
        <div className="cw-budget-bar">
          <div
            className="cw-budget-fill"
            data-testid="budget-fill"
            data-color={barColor}
            style={{ width: `${budgetBarWidth(budget.used_pct)}%`, background: COLOR_HEX[barColor] }}
          />
        </div>
        <div className="cw-card-sub cw-budget-line">
          <span
            className="cw-status-dot"
            data-testid="status-dot"
            data-color={dotColor}
            style={{ background: COLOR_HEX[dotColor] }}
          />
          {`예산: ${budget.used_pct}% (${formatKRW(budget.limit_krw)} 한도)`}
        </div>
      </div>

      <div className="cw-card cw-card--alltime">
        <div className="cw-card-label">전체 누적</div>
        <div className="cw-card-value cw-card-value--small">{formatKRW(alltime.krw)}</div>
        <div className="cw-card-sub">{`${formatUSD(alltime.usd)} USD | 환율: ${formatRate(exchange_rate)}/USD`}</div>
      </div>

      {models && models.length > 0 && (
        <div className="cw-card">
          <div className="cw-card-label">모델별 비용</div>
          {models.map((m) => (
            <div className="cw-model-row" key={m.model}>
              <span className="cw-model-name" title={m.model}>{truncateModelName(m.model)}</span>
              <span className="cw-model-cost">
                {formatKRW(m.cost_krw)} <small>{`(${formatUSD(m.cost_usd)})`}</small>
              </span>
            </div>
          ))}
        </div>
      )}
    </>
  );
}

/** Floating button plus panel; purely a function of UIState */
export function CostWidget({ state, apiBase, onToggle }: CostWidgetProps) {
  const snapshot = state.lastSnapshot;

  return (
    <>
      <button
        type="button"
        className="cw-button"
        title="API 비용 모니터"
        aria-expanded={state.isOpen}
        style={{ background: buttonGradient(snapshot?.budget.status) }}
        onClick={onToggle}
      >
        ₩
      </button>

      {state.isOpen && (
        <div className="cw-panel" role="dialog" aria-label="API 비용 모니터">
          <div className="cw-header">
            <h3>API 비용 모니터</h3>
            <small>실시간 추적</small>
          </div>
          <div className="cw-body">
            {state.phase === 'error' && (
              <div className="cw-error" role="alert">
                <div>{`⚠️ ${state.lastError ?? ''}`}</div>
                <small>{`비용 API 서버(${apiBase})가 실행 중인지 확인하세요.`}</small>
              </div>
            )}
            {snapshot ? (
              <SnapshotCards snapshot={snapshot} />
            ) : (
              state.phase !== 'error' && <div className="cw-loading">로딩 중...</div>
            )}
          </div>
          <div className="cw-footer">
            <small>{footerText(state)}</small>
          </div>
        </div>
      )}
    </>
  );
}
