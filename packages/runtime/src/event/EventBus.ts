import { EventEmitter } from "eventemitter3";
import { nanoid } from "nanoid";
import { Observable } from "rxjs";
import type { BusEvent, EventPayload, EventType } from "../types/index.js";

export class EventBus {
  // 底层 EventEmitter 负责把事件按推送方式广播给订阅者。
  private emitter = new EventEmitter();

  /**
   * 将事件立即广播给所有活跃的订阅者。
   */
  public emit(event: BusEvent): void {
    this.emitter.emit("event", event);
  }

  /**
   * 便捷方法：补齐 eventId 与时间戳后广播。
   */
  public publish(
    type: EventType,
    traceId: string,
    payload: EventPayload,
    relatedTaskId?: number
  ): BusEvent {
    const event: BusEvent = {
      eventId: nanoid(),
      type,
      timestamp: Date.now(),
      traceId,
      ...(relatedTaskId === undefined ? {} : { relatedTaskId }),
      payload,
    };
    this.emit(event);
    return event;
  }

  /**
   * 暴露一个冷 Observable，在订阅时挂接到 EventEmitter，
   * 并在取消订阅时自动移除此监听。
   */
  public events(): Observable<BusEvent> {
    return new Observable<BusEvent>((subscriber) => {
      const handler = (event: BusEvent) => subscriber.next(event);
      this.emitter.on("event", handler);
      return () => {
        this.emitter.off("event", handler);
      };
    });
  }
}
