import { Button, Space, Typography } from "antd";
import { Topics, type EventBus } from "@vecscene/event-bus";
import { useEffect, useMemo, useRef, useState } from "react";

export type LogPanelProps = {
  bus: EventBus;
};

type LogEntry = {
  id: number;
  time: number;
  topic: string;
  payload: unknown;
};

const MAX_LOGS = 200;

export function LogPanel({ bus }: LogPanelProps) {
  const [collapsed, setCollapsed] = useState<boolean>(true);
  const [logs, setLogs] = useState<LogEntry[]>([]);
  const scrollRef = useRef<HTMLDivElement | null>(null);
  const nextId = useRef(0);

  const visibleLogs = useMemo(() => (collapsed ? [] : logs), [collapsed, logs]);

  useEffect(() => {
    return bus.subscribe(Topics.LOG_EVENT, (payload) => {
      nextId.current += 1;
      const entry: LogEntry = {
        id: nextId.current,
        time: Date.now(),
        topic: payload.topic,
        payload: payload.payload
      };

      setLogs((prev) => {
        const next = [...prev, entry];
        if (next.length <= MAX_LOGS) return next;
        return next.slice(next.length - MAX_LOGS);
      });
    });
  }, [bus]);

  useEffect(() => {
    const el = scrollRef.current;
    if (!el) return;
    el.scrollTop = el.scrollHeight;
  }, [visibleLogs]);

  return (
    <div style={{ height: collapsed ? 28 : 200, display: "flex", flexDirection: "column" }}>
      <div
        style={{
          height: 28,
          display: "flex",
          alignItems: "center",
          justifyContent: "space-between",
          padding: "0 10px"
        }}
      >
        <Typography.Text style={{ color: "rgba(255,255,255,0.65)" }}>
          Log ({logs.length})
        </Typography.Text>
        <Space size={4}>
          <Button size="small" onClick={() => setLogs([])} disabled={logs.length === 0}>
            Clear
          </Button>
          <Button size="small" onClick={() => setCollapsed((v) => !v)}>
            {collapsed ? "Expand" : "Collapse"}
          </Button>
        </Space>
      </div>

      {!collapsed && (
        <div
          ref={scrollRef}
          style={{
            flex: 1,
            overflow: "auto",
            padding: "8px 10px",
            fontFamily: "ui-monospace, SFMono-Regular, Menlo, Monaco, Consolas, monospace",
            fontSize: 12,
            color: "rgba(255,255,255,0.7)"
          }}
        >
          {visibleLogs.map((log) => (
            <div key={log.id} style={{ whiteSpace: "pre-wrap", marginBottom: 6 }}>
              <div>
                [{new Date(log.time).toLocaleTimeString()}] {log.topic}
              </div>
              <div style={{ color: "rgba(255,255,255,0.5)" }}>{safeStringify(log.payload)}</div>
            </div>
          ))}
        </div>
      )}
    </div>
  );
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch (err) {
    return `${String(value)} (${err instanceof Error ? err.message : "unserializable"})`;
  }
}
