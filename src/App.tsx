import { useCallback, useEffect, useMemo, useRef, useState } from "react";
import { ReorderableList } from "./components/ReorderableList";
import { createConsoleLogger, type Logger } from "./core/logger";
import { createPersistingSink } from "./sink/createPersistingSink";
import type { ItemId, OrderableItem } from "./types";
import "./index.css";

export interface Service extends OrderableItem {
  id: string;
  title: string;
  description: string;
  icon: string;
  color: string;
}

type SaveStatus = "idle" | "saving" | "saved" | "failed";

const initialServices: Service[] = [
  {
    id: "service-web",
    title: "Web Development",
    description: "Responsive sites and single-page apps",
    icon: "💻",
    color: "#3b82f6",
    order: 0,
  },
  {
    id: "service-mobile",
    title: "Mobile Apps",
    description: "Cross-platform apps for iOS and Android",
    icon: "📱",
    color: "#10b981",
    order: 1,
  },
  {
    id: "service-devops",
    title: "DevOps",
    description: "CI pipelines, containers and hosting",
    icon: "⚙️",
    color: "#f59e0b",
    order: 2,
  },
  {
    id: "service-design",
    title: "UI Design",
    description: "Design systems and prototypes",
    icon: "🎨",
    color: "#ec4899",
    order: 3,
  },
];

const statusMessages: Record<SaveStatus, string> = {
  idle: "",
  saving: "Saving order…",
  saved: "Order saved",
  failed: "Could not save order, previous order restored",
};

// Stands in for the bulk "update order" endpoint
const simulateSave = (_orderedIds: ItemId[]) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, 300);
  });

const appLogger = createConsoleLogger();

interface AppProps {
  persist?: (orderedIds: ItemId[]) => Promise<void>;
  logger?: Logger;
  services?: Service[];
}

function App({ persist = simulateSave, logger = appLogger, services: seed = initialServices }: AppProps) {
  const [services, setServices] = useState<Service[]>(seed);
  const [status, setStatus] = useState<SaveStatus>("idle");
  const [locked, setLocked] = useState(false);
  // Orders to step back to, most recent last
  const [history, setHistory] = useState<Service[][]>([]);

  const servicesRef = useRef(services);
  useEffect(() => {
    servicesRef.current = services;
  }, [services]);

  const sink = useMemo(
    () =>
      createPersistingSink<Service>({
        getItems: () => servicesRef.current,
        apply: (items) => {
          servicesRef.current = items;
          setServices(items);
        },
        persist: async (orderedIds) => {
          setStatus("saving");
          await persist(orderedIds);
          setStatus("saved");
        },
        onError: () => setStatus("failed"),
        logger,
      }),
    [persist, logger],
  );

  const handleReorder = useCallback(
    (items: Service[]) => {
      const previous = servicesRef.current;
      setHistory((prev) => [...prev, previous]);
      sink.onReorder(items);
    },
    [sink],
  );

  const undoLastReorder = useCallback(() => {
    if (history.length === 0) return;
    const previous = history[history.length - 1];
    setHistory(history.slice(0, -1));
    sink.onReorder(previous);
  }, [history, sink]);

  const resetOrder = useCallback(() => {
    setHistory([]);
    sink.onReorder(seed);
  }, [seed, sink]);

  const toggleLocked = useCallback(() => {
    setLocked((prev) => !prev);
  }, []);

  return (
    <div className="services">
      <header className="services__header">
        <h1 className="services__title">Services</h1>
        <p className="services__subtitle">
          Drag a card by its handle to change the order shown on the portfolio
        </p>
        <label className="services__lock">
          <input type="checkbox" checked={locked} onChange={toggleLocked} />
          Lock order
        </label>
        <div className="services__actions">
          <button type="button" onClick={undoLastReorder} disabled={locked || history.length === 0}>
            Undo last reorder
          </button>
          <button type="button" onClick={resetOrder} disabled={locked}>
            Reset order
          </button>
        </div>
        <p className="services__status" role="status">
          {statusMessages[status]}
        </p>
      </header>

      <ReorderableList
        items={services}
        onReorder={handleReorder}
        disabled={locked}
        logger={logger}
        className="services__list"
        renderItem={(service, { isDragging }, handleProps) => (
          <article
            className={`service-card ${isDragging ? "service-card--lifted" : ""}`}
            style={{ borderColor: service.color }}
          >
            <div
              {...handleProps}
              className="service-card__handle"
              aria-label={`Reorder ${service.title}`}
              title="Drag to reorder • Touch and hold on mobile"
            >
              <span aria-hidden="true">⋮⋮</span>
              <span className="service-card__position">#{service.order + 1}</span>
            </div>
            <span className="service-card__icon" style={{ color: service.color }}>
              {service.icon}
            </span>
            <div className="service-card__body">
              <h2 className="service-card__title">{service.title}</h2>
              <p className="service-card__description">{service.description}</p>
            </div>
          </article>
        )}
      />
    </div>
  );
}

export default App;
