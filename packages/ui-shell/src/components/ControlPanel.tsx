import { Button, Card, Form, Select, Space, Switch, Typography } from "antd";
import { PauseCircleOutlined, PlayCircleOutlined, ReloadOutlined } from "@ant-design/icons";
import type { FitModeOption, SceneControls } from "../types.js";

export type ControlPanelProps = {
  value: SceneControls;
  onChange: (next: SceneControls) => void;
  onRestart: () => void;
};

const FIT_MODES: { value: FitModeOption; label: string }[] = [
  { value: "fill", label: "Fill rectangle" },
  { value: "original", label: "Original size" },
  { value: "exact", label: "Exact 128 x 128" }
];

export function ControlPanel({ value, onChange, onRestart }: ControlPanelProps) {
  return (
    <div style={{ padding: 10 }}>
      <Card size="small" title="Scene">
        <Form layout="vertical" size="small">
          <Form.Item label="Image fit mode">
            <Select
              value={value.fitMode}
              options={FIT_MODES}
              onChange={(fitMode: FitModeOption) => onChange({ ...value, fitMode })}
            />
          </Form.Item>
          <Form.Item label="Alpha mask">
            <Switch checked={value.masked} onChange={(masked) => onChange({ ...value, masked })} />
          </Form.Item>
        </Form>
        <Space>
          <Button
            icon={value.paused ? <PlayCircleOutlined /> : <PauseCircleOutlined />}
            onClick={() => onChange({ ...value, paused: !value.paused })}
          >
            {value.paused ? "Resume" : "Pause"}
          </Button>
          <Button icon={<ReloadOutlined />} onClick={onRestart}>
            Restart
          </Button>
        </Space>
      </Card>
      <Typography.Paragraph type="secondary" style={{ marginTop: 12, fontSize: 12 }}>
        A repeating grating drawn through a radial alpha mask, with an anchor dot, centred text
        and a fitted image. Coordinates are centred on the canvas.
      </Typography.Paragraph>
    </div>
  );
}
